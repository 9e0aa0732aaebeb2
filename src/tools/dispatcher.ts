// Request dispatcher: one generic routine for every tool. Each call is
// validated against the tool's schema, its recipe turns the arguments into a
// prompt and a command vector, and the executor's result becomes the response.
import type { z } from 'zod';
import { annotatePaths } from '../paths/annotator.js';
import { resolveTemplate, verificationPrompt } from '../prompts/templates.js';
import type { Executor } from '../execution/executor.js';
import { GeminiMcpError, GeminiMcpErrorCode, missingArgument } from '../shared/errors.js';
import type { CommandVector, ToolResponse } from '../types.js';
import { logger } from '../logger.js';
import type { ToolDef, ToolRegistry } from './registry.js';
import type { PromptSource, RecipeTable, ToolRecipe } from './recipes.js';

export const PROMPT_FLAG = '-p';
export const ALL_FILES_FLAG = '--all_files';
export const MODEL_FLAG = '-m';

export interface CommandSettings {
  program: string;
  model?: string;
  extraArgs?: readonly string[];
}

export interface Invocation {
  readonly command: CommandVector;
  readonly cwd?: string;
}

export interface DispatcherDeps {
  registry: ToolRegistry;
  recipes: RecipeTable;
  executor: Executor;
  settings: CommandSettings;
}

type ArgMap = Record<string, unknown>;

function validateArguments(def: ToolDef, args: ArgMap): ArgMap {
  const shape: z.ZodRawShape = def.inputSchema.shape;
  for (const [key, schema] of Object.entries(shape)) {
    if (args[key] == null && !schema.isOptional()) {
      throw missingArgument(def.name, key);
    }
  }
  const parsed = def.inputSchema.safeParse(args);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new GeminiMcpError(
      GeminiMcpErrorCode.INVALID_ARGUMENT,
      `Invalid arguments for ${def.name}: ${issues.join('; ')}`,
      { tool: def.name, issues },
    );
  }
  const values: ArgMap = parsed.data;
  return values;
}

function readString(values: ArgMap, key: string): string | undefined {
  const value = values[key];
  return typeof value === 'string' ? value : undefined;
}

function readStringList(values: ArgMap, key: string): string[] {
  const value = values[key];
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function requireString(tool: string, values: ArgMap, key: string): string {
  const value = readString(values, key);
  if (value === undefined) throw missingArgument(tool, key);
  return value;
}

function resolvePromptText(tool: string, recipe: ToolRecipe, values: ArgMap): string {
  if (recipe.overrideArgument) {
    const override = readString(values, recipe.overrideArgument);
    if (override) return override;
  }
  const source: PromptSource = recipe.prompt;
  switch (source.kind) {
    case 'argument':
      return requireString(tool, values, source.argument);
    case 'template':
      return resolveTemplate(source.table, requireString(tool, values, source.argument));
    case 'verification':
      return verificationPrompt(requireString(tool, values, source.argument));
  }
}

export class RequestDispatcher {
  constructor(private readonly deps: DispatcherDeps) {}

  /**
   * Builds the command for a known tool. Throws MISSING_ARGUMENT or
   * INVALID_ARGUMENT before anything is spawned; returns null for an unknown tool.
   */
  async buildInvocation(toolName: string, args: ArgMap): Promise<Invocation | null> {
    const def = this.deps.registry.getTool(toolName);
    const recipe = this.deps.recipes.get(toolName);
    if (!def || !recipe) return null;

    const values = validateArguments(def, args);
    const cwd = readString(values, 'working_directory') || undefined;

    const references = recipe.pathArgument
      ? await annotatePaths(readStringList(values, recipe.pathArgument), { cwd, kind: recipe.pathKind })
      : '';
    const promptText = resolvePromptText(def.name, recipe, values);
    const finalPrompt = [references, promptText].filter(Boolean).join(' ');

    const { program, model, extraArgs = [] } = this.deps.settings;
    const command: string[] = [program];
    if (model) command.push(MODEL_FLAG, model);
    command.push(...extraArgs);
    if (recipe.allFiles) command.push(ALL_FILES_FLAG);
    command.push(PROMPT_FLAG, finalPrompt);

    return { command, cwd };
  }

  async dispatch(toolName: string, args: ArgMap): Promise<ToolResponse> {
    const invocation = await this.buildInvocation(toolName, args);
    if (!invocation) {
      logger.warn({ tool: toolName }, 'Unknown tool requested');
      return { text: `Unknown tool: ${toolName}`, isError: false };
    }

    logger.debug({ tool: toolName, argc: invocation.command.length, cwd: invocation.cwd }, 'Dispatching tool call');
    const result = await this.deps.executor.run(invocation.command, invocation.cwd);

    if (result.exitCode !== 0) {
      logger.warn({ tool: toolName, exitCode: result.exitCode }, 'Tool command failed');
      return { text: `Error: ${result.stderr}`, isError: true };
    }
    return { text: result.stdout, isError: false };
  }
}
