import pino, { Level, Logger } from 'pino';

export function levelForVerbosity(verbosity: number): Level {
  if (verbosity >= 2) return 'trace';
  if (verbosity === 1) return 'debug';
  return 'info';
}

export function createLogger(verbosity = 0): Logger {
  return pino({
    level: levelForVerbosity(verbosity),
    transport: { target: 'pino-pretty' },
  });
}
