import pino from 'pino';
import { LOG_LEVEL } from '../config';

const usePrettyTransport =
  process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

/** File descriptor log lines go to: 1 for the worker, 2 for scripts that print results. */
export type LogDestination = 1 | 2;

export function createLogger(service: string, destination: LogDestination = 1) {
  const options = {
    level: LOG_LEVEL,
    base: { service },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return usePrettyTransport
    ? pino({ ...options, transport: { target: 'pino/file', options: { destination } } })
    : pino(options, pino.destination({ dest: destination, sync: true }));
}

export const logger = createLogger('cleaning-worker');

export type Logger = typeof logger;

/** Create a child logger scoped to a specific worker. */
export function workerLogger(workerName: string): Logger {
  return logger.child({ worker: workerName });
}
