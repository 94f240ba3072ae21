import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../errors/DomainError';

// Load environment variables
dotenv.config();

/**
 * Title list shipped with the project (resources/ at the package root).
 */
export const DEFAULT_TITLES_PATH = path.resolve(__dirname, '../../resources/titles.txt');

// Environment variables schema
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

  // Name sanitizing
  TITLES_PATH: z.string().optional(),

  // Signature detection
  SIGNATURE_LENGTH_DIVISOR: z
    .string()
    .regex(/^[1-9]\d*$/, 'must be a positive integer')
    .default('2'),

  // Message decoding
  DEFAULT_CHARSET: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validate an environment map, raising ConfigurationError on the first bad setting.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const issue = result.error.issues[0];
    const setting = issue ? issue.path.join('.') : 'environment';
    throw new ConfigurationError(
      `Invalid environment: ${setting} ${issue ? issue.message : ''}`.trim(),
      setting,
      { issues: result.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })) }
    );
  }
  return result.data;
}

// Parse and validate environment variables
const env = parseEnv(process.env);

// Export typed configuration
export const config = {
  env: env.NODE_ENV,
  logLevel: env.LOG_LEVEL,

  titlesPath: env.TITLES_PATH ? path.resolve(env.TITLES_PATH) : DEFAULT_TITLES_PATH,

  signature: {
    lengthDivisor: parseInt(env.SIGNATURE_LENGTH_DIVISOR, 10),
  },

  defaultCharset: env.DEFAULT_CHARSET || undefined,
};

export default config;
