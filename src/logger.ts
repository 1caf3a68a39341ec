import { pino, destination } from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export type { Logger };

export interface LoggerOptions {
  readonly level?: LevelWithSilent;
  /** Human-readable output through pino-pretty, for terminals. */
  readonly pretty?: boolean;
}

/** Root logger. Writes to stderr so stdout stays free for command output. */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? parseLevel(process.env['LOG_LEVEL']);

  if (options.pretty) {
    return pino({
      name: 'streamload',
      level,
      transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } },
    });
  }

  return pino({ name: 'streamload', level }, destination(2));
}

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function parseLevel(value: string | undefined): LevelWithSilent {
  return LEVELS.find((level) => level === value) ?? 'info';
}
