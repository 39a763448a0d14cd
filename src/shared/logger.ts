import pino from 'pino';

// stdout carries the MCP protocol, so log lines go to stderr.
export const logger = pino(
  {
    name: 'hdl-test-supervisor',
    level: process.env['LOG_LEVEL'] ?? (process.env['NODE_ENV'] === 'test' ? 'silent' : 'info'),
  },
  pino.destination(2)
);
