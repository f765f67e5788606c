import pino from 'pino';

// JSON lines to stdout, or to LOG_FILE when set.
const destination = process.env.LOG_FILE
  ? pino.destination({ dest: process.env.LOG_FILE, mkdir: true, sync: false })
  : pino.destination(1);

export const logger = pino(
  {
    level: process.env.LOG_LEVEL || 'info',
    base: { service: 'dns-ip-sync' },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  destination,
);

export default logger;
