import winston from 'winston';
import { env } from './env';

const ROTATE_BYTES = 5 * 1024 * 1024;

interface ConsoleLineFields {
  timestamp?: unknown;
  level: string;
  message: unknown;
  [key: string]: unknown;
}

// Fields every line carries through defaultMeta; the console leaves them out
const QUIET_FIELDS = new Set(['service', 'environment', 'guardian', 'riskGate']);

/**
 * `<time> [level] [session]: message {meta}`. The session tag is dropped when
 * the entry is not tied to a conversation.
 */
export function formatConsoleLine({ timestamp, level, message, sessionId, ...rest }: ConsoleLineFields): string {
  const meta = Object.fromEntries(Object.entries(rest).filter(([key]) => !QUIET_FIELDS.has(key)));
  const session = typeof sessionId === 'string' ? ` [${sessionId}]` : '';
  const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} [${level}]${session}: ${String(message)}${metaStr}`;
}

export const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    env.LOG_FORMAT === 'json' ? winston.format.json() : winston.format.simple()
  ),
  defaultMeta: {
    service: 'banking-assistant',
    environment: env.NODE_ENV,
    guardian: env.GUARDIAN_ENABLED,
    riskGate: env.RISK_GATE_ENABLED
  },
  transports: [
    new winston.transports.Console({
      silent: env.NODE_ENV === 'test',
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(info => formatConsoleLine(info))
      )
    })
  ]
});

// warn and above: guardrail refusals, held requests and fallbacks
if (env.NODE_ENV === 'production') {
  logger.add(new winston.transports.File({
    filename: 'logs/error.log',
    level: 'error',
    maxsize: ROTATE_BYTES,
    maxFiles: 5
  }));

  logger.add(new winston.transports.File({
    filename: 'logs/guardrails.log',
    level: 'warn',
    maxsize: ROTATE_BYTES,
    maxFiles: 5
  }));
}

// Stream for the morgan access log
export const stream = {
  write: (message: string) => {
    logger.http(message.trim());
  }
};
