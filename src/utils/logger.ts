import pino from 'pino';
import pretty from 'pino-pretty';
import { env } from './env';

const stream = env.nodeEnv === 'production'
  ? pino.destination({ sync: true })
  : pretty({
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
      sync: true,
    });

export const logger = pino(
  {
    name: 'addon-metadata-sync',
    level: env.logLevel,
  },
  stream,
);

// Keeps long descriptions readable in log lines
export const truncateForLog = (text: string, maxLength = 60): string => {
  if (!text) return '';
  return text.length > maxLength ? `${text.substring(0, maxLength)}...` : text;
};
