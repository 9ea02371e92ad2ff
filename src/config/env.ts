import { z } from 'zod';
import dotenv from 'dotenv';

// Load .env file
dotenv.config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // Export defaults (CLI flags take precedence)
  EXPORT_TIMEZONE: z.string().optional(),
  EXPORT_AUTHOR: z.string().optional(),
  EXPORT_TAG: z.string().optional(),
  EXPORT_UNSAFE_VIDEO: z.string().default('false').transform(v => v === 'true'),
  EXPORT_USERNAME: z.string().default(''),
  EXPORT_FAILURE_POLICY: z.enum(['abort', 'skip']).default('abort'),

  // Rendering
  PROFILE_BASE_URL: z.string().url().default('http://x.com'),
  MAX_CHAIN_LENGTH: z.string().default('10000').transform(Number).pipe(z.number().int().positive()),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error('❌ Invalid environment variables:');
    console.error(result.error.format());
    console.error('\n💡 Check your .env file against .env.example.');
    process.exit(1);
  }

  return result.data;
}

export const env = validateEnv();
