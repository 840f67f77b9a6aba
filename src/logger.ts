import pino from 'pino';

const level = process.env.LOG_LEVEL ?? 'info';
const plainJson = process.env.NODE_ENV === 'production' || process.env.NODE_ENV === 'test';

export const logger = pino({
  name: 'realtime-voice-client',
  level,
  transport: plainJson
    ? undefined
    : {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
        },
      },
});

export const REALTIME_DEBUG = process.env.REALTIME_DEBUG === 'true';
