import { ConfigService } from '@nestjs/config';

/**
 * Environment values arrive as strings; these coerce them with a default.
 */

export function readNumber(config: ConfigService, key: string, fallback: number): number {
  const raw = config.get<string | number>(key);
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

export function readBoolean(config: ConfigService, key: string, fallback: boolean): boolean {
  const raw = config.get<string | boolean>(key);
  if (raw === undefined || raw === '') return fallback;
  if (typeof raw === 'boolean') return raw;
  return !['false', '0', 'no', 'off'].includes(raw.trim().toLowerCase());
}

export function readString(config: ConfigService, key: string, fallback: string): string {
  const raw = config.get<string>(key);
  return raw === undefined || raw === '' ? fallback : raw;
}
