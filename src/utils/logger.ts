import { pino, type DestinationStream, type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

/** pino logger tagged with the component name; level falls back to LOG_LEVEL, then info. */
export function createLogger(name: string, level?: LevelWithSilent, destination?: DestinationStream): Logger {
  const opts = { name, level: level ?? parseLevel(process.env.LOG_LEVEL) };
  return destination ? pino(opts, destination) : pino(opts);
}

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function parseLevel(raw: string | undefined): LevelWithSilent {
  const found = LEVELS.find((l) => l === raw?.toLowerCase());
  return found ?? 'info';
}
