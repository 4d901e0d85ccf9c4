import { validateSync } from 'class-validator';
import { plainToInstance } from 'class-transformer';
import { Logger } from '@nestjs/common';

const logger = new Logger('ConfigValidation');

function describeValue(value: unknown): string {
  return JSON.stringify(value) ?? String(value);
}

/**
 * Convert a raw config section to its class and validate it
 * Throws with every violated constraint and the rejected value listed
 */
export function validateConfig<T extends object>(
  config: Record<string, unknown>,
  sectionName: string,
  validationClass: new () => T,
): T {
  const validatedConfig = plainToInstance(validationClass, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    const errorMessages = errors
      .map(error => `${Object.values(error.constraints || {}).join(', ')} (got ${describeValue(error.value)})`)
      .join('; ');

    logger.error(`Configuration validation failed for ${sectionName}`);
    throw new Error(`Invalid configuration for ${sectionName}: ${errorMessages}`);
  }

  return validatedConfig;
}
