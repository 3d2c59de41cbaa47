import { pino } from 'pino';

import { LogLevelSchema } from '../utils/config.js';

const level = LogLevelSchema.catch('info').parse(process.env.LOG_LEVEL);

export const logger = pino({
  name: 'messenger-graph',
  level,
  redact: {
    paths: ['accessToken', 'access_token', '*.access_token'],
    censor: '[redacted]',
  },
});
