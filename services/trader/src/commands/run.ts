import { createLogger, requireEnv } from '@crossbot/shared-utils';
import { loadTradingConfig } from '../config/trading.js';
import { BinanceClient } from '../exchange/binance/client.js';
import { TradingLoop } from '../execution/trading-loop.js';

/**
 * 실거래 루프 실행 - SIGINT/SIGTERM을 받으면 진행 중인 사이클을 마치고 반환한다
 * (두 번째 시그널은 즉시 종료)
 */
export async function runTrader(): Promise<void> {
  const config = loadTradingConfig();
  const logger = createLogger('trader', config.logLevel);

  const exchange = new BinanceClient({
    baseUrl: config.binanceBaseUrl,
    apiKey: requireEnv('API_KEY'),
    secretKey: requireEnv('SECRET_KEY'),
    logger: logger.child('binance'),
  });

  const loop = new TradingLoop({ exchange, config, logger });

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) {
      logger.warn('종료 시그널 재수신, 강제 종료', { signal });
      process.exit(1);
    }

    stopping = true;
    logger.info('종료 시그널 수신, 진행 중인 사이클 후 중지', { signal, state: loop.state });
    loop.stop();
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  try {
    await loop.start();
  } finally {
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
  }
}
