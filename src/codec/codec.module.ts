import { Module } from '@nestjs/common';
import { CompositeCodecService } from './codec.service';

/**
 * Codec module provides the configured composite codec
 * Requires the codec configuration namespace; the types namespace is optional
 */
@Module({
  providers: [
    CompositeCodecService
  ],
  exports: [
    CompositeCodecService
  ],
})
export class CodecModule {}
