import pino from 'pino';

/**
 * Process-wide pino logger.
 *
 * Writes synchronously to stderr: stdout carries nothing but discovered hosts,
 * and a CLI run may exit right after its last log line.
 */
const logger = pino(
  {
    level: process.env.LOG_LEVEL || 'info',
    base: null,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  },
  pino.destination({ dest: 2, sync: true }),
);

export default logger;
