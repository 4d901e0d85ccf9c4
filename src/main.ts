#!/usr/bin/env node
/**
 * pgrecord entry point - decodes a composite literal against a type from the type definitions file
 * Usage: pgrecord decode <type> <literal>
 */
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { CompositeCodecService } from './codec/codec.service';
import { stringify } from './codec/values';
import { getLogLevels } from './common/logging.utils';

const USAGE = 'Usage: pgrecord decode <type> <literal>';

async function bootstrap() {
  const logger = new Logger('pgrecord');

  const [command, typeName, literal] = process.argv.slice(2);
  if (command !== 'decode' || !typeName || literal === undefined) {
    logger.error(USAGE);
    process.exitCode = 2;
    return;
  }

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: getLogLevels(process.env.LOG_LEVEL),
  });

  try {
    const codec = app.get(CompositeCodecService);
    const value = codec.parseComposite(literal, typeName);

    value.descriptor.fields.forEach((field, index) => {
      const attribute = value.getAttributes()[index];
      const shown = attribute === null ? 'NULL' : `${stringify(attribute, codec.session.calendar) ?? 'NULL'} (${attribute.kind})`;
      logger.log(`${field.name} ${field.declaredTypeName}: ${shown}`);
    });
    logger.log(`Rendered: ${codec.render(value)}`);
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('pgrecord');
  logger.error('Failed to decode literal', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
