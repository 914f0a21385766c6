import pino from 'pino';

/** Field names whose values never reach the log, at the top level or one object down */
const SECRET_FIELDS = ['token', 'githubToken', 'password', 'secret', 'authorization', 'credentials'];

const REDACT_PATHS = [
  ...SECRET_FIELDS.flatMap((field) => [field, `*.${field}`]),
  'headers.authorization',
  'request.headers.authorization',
  'GITHUB_TOKEN',
  'env.GITHUB_TOKEN',
];

/**
 * Root logger for CLI runs. Components derive children from it with their
 * identity (trialId, container, batch).
 *
 * Level comes from the argument, else LOG_LEVEL, else 'info'. Pass a
 * destination to capture output instead of writing to stdout.
 */
export function createLogger(level?: string, destination?: pino.DestinationStream): pino.Logger {
  return pino(
    {
      level: level || process.env.LOG_LEVEL || 'info',
      redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
    },
    destination
  );
}

export type { Logger } from 'pino';
