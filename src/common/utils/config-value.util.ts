// src/common/utils/config-value.util.ts
import { ConfigService } from '@nestjs/config';

/**
 * Read a numeric setting; undefined when unset, blank or not a number
 */
export function readNumber(configService: ConfigService, key: string): number | undefined {
  const raw = configService.get<string>(key);
  if (raw === undefined || raw === null || String(raw).trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}
