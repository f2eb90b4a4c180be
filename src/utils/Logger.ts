import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogMeta = Record<string, unknown>;

/**
 * Destino de logs inyectado en los servicios. Lo crea quien llama, nunca es estado global.
 */
export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

const PRIORIDAD: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function formatearMeta(meta?: LogMeta): string {
  if (!meta || Object.keys(meta).length === 0) {
    return '';
  }
  return ' ' + chalk.gray(JSON.stringify(meta));
}

/**
 * Logger de consola con umbral de verbosidad. Escribe todo en stderr:
 * stdout queda para la salida del comando (por ejemplo, la instantánea JSON).
 */
export function createConsoleLogger(level: LogLevel = 'info'): Logger {
  const habilitado = (nivel: LogLevel): boolean => PRIORIDAD[nivel] >= PRIORIDAD[level];

  return {
    debug(message, meta) {
      if (habilitado('debug')) {
        console.error(chalk.gray(`🔍 ${message}`) + formatearMeta(meta));
      }
    },
    info(message, meta) {
      if (habilitado('info')) {
        console.error(chalk.blue(`ℹ️  ${message}`) + formatearMeta(meta));
      }
    },
    warn(message, meta) {
      if (habilitado('warn')) {
        console.error(chalk.yellow(`⚠️  ${message}`) + formatearMeta(meta));
      }
    },
    error(message, meta) {
      if (habilitado('error')) {
        console.error(chalk.red(`❌ ${message}`) + formatearMeta(meta));
      }
    },
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
