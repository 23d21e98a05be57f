#!/usr/bin/env node
import { Command } from 'commander';
import { createLogger } from '@crossbot/shared-utils';
import { loadTradingConfig } from './config/trading.js';
import { BinanceClient } from './exchange/binance/client.js';
import { runTrader } from './commands/run.js';
import { evaluateSignal, formatSignalReport } from './commands/signal.js';
import { checkKeys, formatKeyStatus } from './commands/check-keys.js';

const logger = createLogger('crossbot-cli');
const program = new Command();

program
  .name('crossbot')
  .description('이동평균 크로스오버 자동매매 CLI')
  .version('0.1.0');

/**
 * 실거래 루프
 */
program
  .command('run')
  .description('폴링 루프 시작 (DRY_RUN=false일 때만 실제 주문)')
  .action(async () => {
    try {
      await runTrader();
    } catch (error) {
      logger.error('trader 치명적 오류', error);
      process.exit(1);
    }
  });

/**
 * 현재 신호 1회 조회
 */
program
  .command('signal')
  .description('주문 없이 현재 크로스오버 신호 계산')
  .option('-s, --symbol <symbol>', '심볼 (기본: TRADE_SYMBOL)')
  .action(async (options: { symbol?: string }) => {
    try {
      const config = loadTradingConfig();
      const exchange = new BinanceClient({
        baseUrl: config.binanceBaseUrl,
        logger: createLogger('binance-client', config.logLevel),
      });

      const report = await evaluateSignal(exchange, {
        ...config,
        symbol: options.symbol?.trim().toUpperCase() || config.symbol,
      });

      for (const line of formatSignalReport(report)) console.log(line);
    } catch (error) {
      logger.error('신호 조회 실패', error);
      process.exit(1);
    }
  });

/**
 * 자격증명 설정 확인
 */
program
  .command('check-keys')
  .description('API_KEY / SECRET_KEY 설정 여부 확인 (값은 출력하지 않음)')
  .action(() => {
    const status = checkKeys();
    for (const line of formatKeyStatus(status)) console.log(line);
    if (!status.API_KEY || !status.SECRET_KEY) process.exitCode = 1;
  });

// CLI 실행
program.parse();
