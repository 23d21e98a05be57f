/**
 * 거래소 호출 실패 (인증, 레이트리밋, 네트워크, 응답 형식 오류)
 */
export class ExchangeError extends Error {
  endpoint: string;
  status?: number;
  code?: number;

  constructor(message: string, opts: { endpoint: string; status?: number; code?: number; cause?: unknown }) {
    super(message, opts.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'ExchangeError';
    this.endpoint = opts.endpoint;
    this.status = opts.status;
    this.code = opts.code;
  }
}
