import pino from 'pino';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

let loggerInstance: pino.Logger | null = null;

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// 環境変数LOG_LEVELが有効な値ならそれを既定値にする
function defaultLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

export function createLogger(level: LogLevel = defaultLevel()): pino.Logger {
  if (loggerInstance) {
    return loggerInstance;
  }

  // silentでは出力先が不要なのでtransportを起動しない
  if (level === 'silent') {
    loggerInstance = pino({ level });
    return loggerInstance;
  }

  loggerInstance = pino({
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
        ignore: 'pid,hostname',
      },
    },
  });
  return loggerInstance;
}

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    return createLogger();
  }
  return loggerInstance;
}
