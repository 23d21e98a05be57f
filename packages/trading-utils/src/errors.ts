/**
 * 로컬 계산 실패 (캔들 부족, 잘못된 기간, 0 가격 등)
 *
 * 네트워크와 무관한 전략 코드에서만 던진다.
 */
export class LocalComputationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LocalComputationError';
  }
}
