import { DateTime } from 'luxon';

export function nowIso(): string {
  const iso = DateTime.utc().toISO();
  if (!iso) throw new Error('현재 시각 ISO 변환 실패');
  return iso;
}

/**
 * epoch millis → UTC ISO 문자열
 */
export function millisToIso(ms: number): string {
  const dt = DateTime.fromMillis(ms, { zone: 'utc' });
  if (!dt.isValid) throw new Error(`ISO 변환 실패: ${ms}`);

  const iso = dt.toISO();
  if (!iso) throw new Error(`ISO 변환 실패: ${ms}`);
  return iso;
}
