#!/usr/bin/env node
/**
 * Gemini analysis MCP server
 *
 * Exposes large-context codebase analysis tools backed by the Gemini CLI:
 * - analyzing files, directories or the whole project with a free-form prompt
 * - verifying whether a feature is implemented
 * - canned security audits and architecture analyses
 * - meta-prompts that tell the agent which of those tools to call
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config/loader.js';
import { createDeps, createServer, SERVER_INFO } from './server.js';
import { logger } from './logger.js';

async function main(): Promise<void> {
  const { config, configPath, fromFile } = loadConfig();
  logger.info(
    { configPath, fromFile, program: config.program, model: config.model, timeoutSeconds: config.timeout_seconds },
    'Configuration loaded',
  );

  const deps = createDeps(config);
  const server = createServer(deps);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(
    { tools: deps.registry.listTools().length, prompts: deps.catalog.listPrompts().length },
    `${SERVER_INFO.name} server running on stdio`,
  );
}

main().catch((err) => {
  logger.fatal({ err }, 'Fatal startup error');
  process.exit(1);
});
