export interface Logger {
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const silent = (): boolean => process.env.NODE_ENV === 'test';

export function createLogger(scope: string): Logger {
  const tag = `[${scope}]`;
  return {
    info: (message, ...details) => {
      if (!silent()) console.log(`${tag} ${message}`, ...details);
    },
    warn: (message, ...details) => {
      if (!silent()) console.warn(`⚠️ ${tag} ${message}`, ...details);
    },
    error: (message, ...details) => {
      if (!silent()) console.error(`❌ ${tag} ${message}`, ...details);
    },
  };
}
