import pino from 'pino';
import { config } from '../config';

export const logger = pino({
  name: 'intake-ocr',
  level: config.logging.level,
  enabled: !config.isTest,
  serializers: {
    error: pino.stdSerializers.err,
  },
});

export type Logger = typeof logger;
