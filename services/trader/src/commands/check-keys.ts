import { env } from '@crossbot/shared-utils';

export const CREDENTIAL_KEYS = ['API_KEY', 'SECRET_KEY'] as const;
export type CredentialKey = (typeof CREDENTIAL_KEYS)[number];

export type KeyStatus = Record<CredentialKey, boolean>;

/**
 * 거래소 자격증명 설정 여부 확인 (값은 출력하지 않음)
 */
export function checkKeys(): KeyStatus {
  return {
    API_KEY: env('API_KEY') !== undefined,
    SECRET_KEY: env('SECRET_KEY') !== undefined,
  };
}

export function formatKeyStatus(status: KeyStatus): string[] {
  return CREDENTIAL_KEYS.map((key) => `${status[key] ? '✅' : '❌'} ${key}: ${status[key] ? '설정됨' : '미설정'}`);
}
