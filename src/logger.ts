import pino from 'pino';

// stdout carries the MCP stdio protocol, so every log line goes to stderr.
export const logger = pino(
  {
    name: 'gemini-mcp',
    level: process.env['LOG_LEVEL'] ?? 'info',
  },
  pino.destination(2),
);
