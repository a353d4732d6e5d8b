// src/common/utils/validation-pipe.factory.ts
import { ValidationPipe } from '@nestjs/common';

/**
 * Global request validation pipe
 *
 * Null and undefined properties skip their validators, so every required
 * DTO field carries `@IsDefined()`.
 */
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    transform: true,
    skipNullProperties: true,
    skipUndefinedProperties: true,
    transformOptions: {
      enableImplicitConversion: true,
    },
  });
}
