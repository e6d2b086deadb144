import pino, { type LevelWithSilent, type Logger } from 'pino';

export type { Logger } from 'pino';

const LEVELS: readonly LevelWithSilent[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
];

function isLevel(value: string): value is LevelWithSilent {
  return (LEVELS as readonly string[]).includes(value);
}

/** DBPROVISION_LOG_LEVEL, defaulting to info */
export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LevelWithSilent {
  const level = env.DBPROVISION_LOG_LEVEL?.toLowerCase();
  return level && isLevel(level) ? level : 'info';
}

/**
 * JSON logs go to stderr so stdout stays free for command output.
 * Anything that looks like the root password is redacted.
 */
export function createLogger(level: LevelWithSilent = getLogLevel()): Logger {
  return pino(
    {
      level,
      redact: {
        paths: ['password', 'rootPassword', 'credential', '*.password', '*.rootPassword'],
        censor: '[REDACTED]',
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true }),
  );
}

export const logger: Logger = createLogger();
