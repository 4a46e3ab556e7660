import { pino, type Logger } from 'pino';

const BASE_LEVEL = process.env.LOG_LEVEL ?? 'info';
const IS_TEST = process.env.NODE_ENV === 'test' || Boolean(process.env.NODE_TEST_CONTEXT);

export type { Logger };

export function createLogger(name: string, level: string = BASE_LEVEL): Logger {
  return pino({
    name,
    level,
    transport:
      process.env.NODE_ENV === 'production' || IS_TEST || !process.stdout.isTTY
        ? undefined
        : {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard'
            }
          }
  });
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
