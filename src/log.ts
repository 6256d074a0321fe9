import pino from 'pino';
import { env } from './env';

export type Logger = pino.Logger;

export const log: Logger = pino({
  level: env.LOG_LEVEL,
  base: { service: 'transcription-api' },
  timestamp: pino.stdTimeFunctions.isoTime,
});
