import { registerAs } from '@nestjs/config';

import { IsOptional, IsNumberString, Matches } from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { AuthConfig } from './auth-config.type';

class EnvironmentVariablesValidator {
  @IsOptional()
  @Matches(/^[A-Za-z0-9_-]+$/)
  AUTH_SESSION_COOKIE?: string;

  @IsOptional()
  @IsNumberString()
  AUTH_SESSION_MAX_AGE_MS?: string;
}

export default registerAs<AuthConfig>('auth', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    sessionCookie: process.env.AUTH_SESSION_COOKIE || 'session_id',
    sessionMaxAge: parseInt(
      process.env.AUTH_SESSION_MAX_AGE_MS || String(24 * 60 * 60 * 1000),
      10,
    ),
  };
});
