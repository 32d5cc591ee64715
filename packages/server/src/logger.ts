import { pino } from 'pino';

/**
 * Process-wide logger. Secrets travel in request bodies and session state,
 * so every field that can hold one is redacted wherever it appears.
 * Starts at info; the entry point applies LOG_LEVEL once config has validated it.
 */
export const logger = pino({
  level: 'info',
  redact: {
    paths: [
      'token',
      'password',
      'do_token',
      'pmm_password',
      '*.token',
      '*.password',
      '*.do_token',
      '*.pmm_password',
      'headers.authorization',
      '*.headers.authorization',
    ],
    censor: '[redacted]',
  },
});
