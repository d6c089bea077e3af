import pino from 'pino';

// stdout carries the MCP transport, so log lines go to stderr.
export const logger = pino(
  {
    name: 'sq-mode',
    level: process.env.LOG_LEVEL ?? 'info',
  },
  pino.destination(2),
);
