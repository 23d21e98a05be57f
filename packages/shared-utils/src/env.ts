import 'dotenv/config';

export function env(key: string): string | undefined {
  const value = process.env[key];
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function envString(key: string, defaultValue: string): string {
  return env(key) ?? defaultValue;
}

export function requireEnv(key: string): string {
  const value = env(key);
  if (!value) {
    throw new Error(`Environment variable ${key} is required but not set`);
  }
  return value;
}

export function envNumber(key: string, defaultValue: number): number;
export function envNumber(key: string): number | undefined;
export function envNumber(key: string, defaultValue?: number): number | undefined {
  const value = env(key);
  if (!value) return defaultValue;
  const num = Number(value);
  if (isNaN(num)) {
    throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return num;
}

export function envBoolean(key: string, defaultValue = false): boolean {
  const value = env(key);
  if (!value) return defaultValue;

  const normalized = value.toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  throw new Error(`Environment variable ${key} must be a boolean, got: ${value}`);
}
