import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListToolsRequestSchema,
  McpError,
  type CallToolResult,
  type GetPromptResult,
  type ListPromptsResult,
  type ListToolsResult,
} from '@modelcontextprotocol/sdk/types.js';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { ServerConfig } from './config/loader.js';
import { CliExecutor, type Executor } from './execution/executor.js';
import { PromptCatalog, type PromptArgs } from './prompts/catalog.js';
import { GeminiMcpError, GeminiMcpErrorCode } from './shared/errors.js';
import { RequestDispatcher } from './tools/dispatcher.js';
import { createRecipeTable } from './tools/recipes.js';
import { ToolRegistry } from './tools/registry.js';
import { logger } from './logger.js';

export const SERVER_INFO = { name: 'gemini-mcp', version: '0.1.0' } as const;

// Coded errors a caller can fix by changing the request.
const INVALID_PARAMS_CODES: ReadonlySet<GeminiMcpErrorCode> = new Set([
  GeminiMcpErrorCode.MISSING_ARGUMENT,
  GeminiMcpErrorCode.INVALID_ARGUMENT,
  GeminiMcpErrorCode.UNKNOWN_PROMPT,
]);

export interface ServerDeps {
  registry: ToolRegistry;
  dispatcher: RequestDispatcher;
  catalog: PromptCatalog;
}

export function toMcpError(err: unknown): unknown {
  if (err instanceof GeminiMcpError && INVALID_PARAMS_CODES.has(err.code)) {
    return new McpError(ErrorCode.InvalidParams, err.message, { code: err.code, ...err.context });
  }
  return err;
}

export function listToolsResult(registry: ToolRegistry): ListToolsResult {
  return {
    tools: registry.listTools().map(t => {
      const jsonSchema: Record<string, unknown> = zodToJsonSchema(t.inputSchema, { $refStrategy: 'none' });
      return {
        name: t.name,
        description: t.description,
        inputSchema: { ...jsonSchema, type: 'object' as const },
      };
    }),
  };
}

export async function callTool(
  dispatcher: RequestDispatcher,
  name: string,
  args: Record<string, unknown>,
): Promise<CallToolResult> {
  try {
    const response = await dispatcher.dispatch(name, args);
    return {
      content: [{ type: 'text', text: response.text }],
      ...(response.isError ? { isError: true } : {}),
    };
  } catch (err) {
    // Argument problems are protocol faults; every execution failure has
    // already been folded into response text by the executor.
    logger.warn({ tool: name, error: err instanceof Error ? err.message : String(err) }, 'Tool call rejected');
    throw toMcpError(err);
  }
}

export function listPromptsResult(catalog: PromptCatalog): ListPromptsResult {
  return {
    prompts: catalog.listPrompts().map(p => ({
      name: p.name,
      description: p.description,
      arguments: p.arguments.map(a => ({ name: a.name, description: a.description, required: a.required })),
    })),
  };
}

export function getPromptResult(catalog: PromptCatalog, name: string, args: PromptArgs): GetPromptResult {
  try {
    return catalog.getPrompt(name, args);
  } catch (err) {
    throw toMcpError(err);
  }
}

export function createDeps(config: ServerConfig, executor?: Executor): ServerDeps {
  const registry = new ToolRegistry();
  const dispatcher = new RequestDispatcher({
    registry,
    recipes: createRecipeTable(),
    executor: executor ?? new CliExecutor({
      program: config.program,
      probeCommand: config.probe_command,
      timeoutMs: config.timeout_seconds * 1000,
      maxBufferBytes: Math.round(config.max_output_mb * 1024 * 1024),
    }),
    settings: { program: config.program, model: config.model, extraArgs: config.extra_args },
  });
  return { registry, dispatcher, catalog: new PromptCatalog() };
}

export function createServer(deps: ServerDeps): Server {
  const server = new Server(SERVER_INFO, { capabilities: { tools: {}, prompts: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => listToolsResult(deps.registry));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return callTool(deps.dispatcher, name, args ?? {});
  });

  server.setRequestHandler(ListPromptsRequestSchema, async () => listPromptsResult(deps.catalog));

  server.setRequestHandler(GetPromptRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return getPromptResult(deps.catalog, name, args ?? {});
  });

  return server;
}
