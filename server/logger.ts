import pino from 'pino';

const logger: pino.Logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'options-exposure-pipeline' },
  // Credential values must never reach log sinks.
  redact: {
    paths: ['accessToken', 'refreshToken', '*.accessToken', '*.refreshToken', 'authorization', '*.authorization'],
    censor: '***',
  },
  formatters: {
    level(label: string) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

// Route console methods through pino so module-prefixed console calls
// (`[fetcher] ...`, `[token] ...`) come out as structured JSON lines.
function formatArgs(args: unknown[]): string {
  return args
    .map((a) => {
      if (a instanceof Error) return a.stack || a.message;
      if (typeof a === 'object' && a !== null) {
        try {
          return JSON.stringify(a);
        } catch {
          return String(a);
        }
      }
      return String(a);
    })
    .join(' ');
}

console.log = (...args: unknown[]) => logger.info(formatArgs(args));
console.error = (...args: unknown[]) => logger.error(formatArgs(args));
console.warn = (...args: unknown[]) => logger.warn(formatArgs(args));
console.info = (...args: unknown[]) => logger.info(formatArgs(args));
console.debug = (...args: unknown[]) => logger.debug(formatArgs(args));

export default logger;
