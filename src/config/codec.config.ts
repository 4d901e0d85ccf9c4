import { registerAs } from '@nestjs/config';
import { IsIn, IsString, Matches } from 'class-validator';
import { validateConfig } from './config-validation';

/**
 * Session settings for the composite codec
 */
export class CodecConfig {
  /** PostgreSQL client encoding used to decode bytea attributes */
  @IsString()
  @Matches(/\S/, { message: 'clientEncoding must name an encoding' })
  clientEncoding!: string;

  /** Zone for temporal text without an explicit offset */
  @IsIn(['local', 'utc'])
  timeZone!: 'local' | 'utc';
}

/**
 * Codec configuration factory
 * Loads settings from environment variables with defaults
 */
export default registerAs('codec', (): CodecConfig => {
  const rawConfig = {
    clientEncoding: process.env.CLIENT_ENCODING || 'UTF8',
    timeZone: process.env.CODEC_TIME_ZONE || 'local',
  };

  return validateConfig(rawConfig, 'codec', CodecConfig);
});
