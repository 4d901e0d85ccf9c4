import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import codecConfig from './config/codec.config';
import typesConfig from './config/types.config';
import { CodecModule } from './codec/codec.module';

/**
 * Root application module for the pgrecord CLI
 * Configuration is loaded first and available globally
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      load: [codecConfig, typesConfig],
    }),

    CodecModule,
  ],
})
export class AppModule {}
