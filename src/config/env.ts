import dotenv from 'dotenv';
import { z } from 'zod';
import path from 'path';

// Project root, for both ts sources (src/config) and the build (dist/config)
export const PROJECT_ROOT = path.resolve(__dirname, '../..');

dotenv.config({ path: path.join(PROJECT_ROOT, '.env') });

const booleanFlag = (fallback: 'true' | 'false') =>
  z.string().transform(val => val === 'true').default(fallback);

// Define the environment schema
const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().transform(Number).default('5000'),
  HOST: z.string().default('0.0.0.0'),

  // Anthropic
  ANTHROPIC_API_KEY: z.string().optional(),
  ANTHROPIC_MODEL: z.string().default('claude-3-5-haiku-20241022'),
  ANTHROPIC_MAX_TOKENS: z.string().transform(Number).default('1024'),
  LLM_TIMEOUT_MS: z.string().transform(Number).default('15000'),

  // Pipeline
  GUARDRAILS_CONFIG_PATH: z.string().default('config/guardrails.json'),
  DATA_DIR: z.string().default('data'),
  DEMO_USER_ID: z.string().min(1).default('user_101'),
  OFF_TOPIC_BLOCKING: booleanFlag('true'),
  GUARDIAN_ENABLED: booleanFlag('false'),
  RISK_GATE_ENABLED: booleanFlag('true'),

  // Sessions
  SESSION_MAX_MESSAGES: z.string().transform(Number).default('40'),
  SESSION_IDLE_TIMEOUT_MS: z.string().transform(Number).default('1800000'),
  SESSION_CLEANUP_INTERVAL_MS: z.string().transform(Number).default('300000'),

  // API
  RATE_LIMIT_WINDOW_MS: z.string().transform(Number).default('60000'),
  RATE_LIMIT_MAX: z.string().transform(Number).default('30'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  LOG_FORMAT: z.enum(['json', 'simple']).default('simple'),

  // CORS
  CORS_ORIGIN: z.string().default('*'),
});

// Parse and validate environment variables
const parseEnv = () => {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('❌ Invalid environment variables:', error.flatten().fieldErrors);
      process.exit(1);
    }
    throw error;
  }
};

export const env = parseEnv();

export type Env = z.infer<typeof envSchema>;

/**
 * Resolve a configured path against the project root unless it is already absolute.
 */
export function resolveProjectPath(configured: string): string {
  return path.isAbsolute(configured) ? configured : path.join(PROJECT_ROOT, configured);
}
