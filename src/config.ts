/**
 * Process configuration
 * Read once from the environment at startup; a missing store URL or key is fatal
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

export interface AppConfig {
  supabaseUrl: string;
  supabaseKey: string;
  table: string;
  port: number;
  host: string;
  corsOrigins: string[];
  logRequests: boolean;
}

const envSchema = z.object({
  SUPABASE_URL: z.string({ required_error: 'SUPABASE_URL is required' }).url('SUPABASE_URL must be a URL'),
  SUPABASE_KEY: z.string({ required_error: 'SUPABASE_KEY is required' }).min(1, 'SUPABASE_KEY is required'),
  ITEMS_TABLE: z.string().min(1).default('items'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().min(1).default('127.0.0.1'),
  CORS_ORIGINS: z.string().default(''),
  LOG_REQUESTS: z.enum(['true', 'false']).default('true'),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Treat empty strings like unset variables so defaults and "required" apply
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const messages = parsed.error.issues.map(issue => issue.message);
    throw new ConfigError(`Invalid configuration: ${messages.join('; ')}`);
  }

  const vars = parsed.data;
  return {
    supabaseUrl: vars.SUPABASE_URL,
    supabaseKey: vars.SUPABASE_KEY,
    table: vars.ITEMS_TABLE,
    port: vars.PORT,
    host: vars.HOST,
    corsOrigins: vars.CORS_ORIGINS.split(',').map(origin => origin.trim()).filter(Boolean),
    logRequests: vars.LOG_REQUESTS === 'true',
  };
}
