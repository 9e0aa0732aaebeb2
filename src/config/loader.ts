// Config loader: built-in defaults <- YAML file <- environment variables.
// The merged object is validated with ServerConfigSchema; add new keys there
// and to DEFAULT_CONFIG together.
import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { GeminiMcpError, GeminiMcpErrorCode } from '../shared/errors.js';
import { logger } from '../logger.js';

export const DEFAULT_CONFIG_PATH = join(homedir(), '.config', 'gemini-mcp', 'config.yaml');

export const ServerConfigSchema = z.object({
  program: z.string().min(1),
  probe_command: z.string().min(1),
  model: z.string().min(1).optional(),
  extra_args: z.array(z.string()),
  timeout_seconds: z.number().int().positive(),
  max_output_mb: z.number().positive(),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

export const DEFAULT_CONFIG: ServerConfig = {
  program: 'gemini',
  probe_command: 'which',
  extra_args: [],
  timeout_seconds: 600,
  max_output_mb: 50,
};

export interface LoadConfigOptions {
  /** Explicit YAML path; falls back to GEMINI_MCP_CONFIG, then DEFAULT_CONFIG_PATH. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

export interface ConfigResult {
  config: ServerConfig;
  configPath: string;
  fromFile: boolean;
}

function readConfigFile(configPath: string): Record<string, unknown> | null {
  if (!existsSync(configPath)) return null;
  try {
    const parsed: unknown = parseYaml(readFileSync(configPath, 'utf-8'));
    if (parsed === null || parsed === undefined) return {};
    if (typeof parsed !== 'object' || Array.isArray(parsed)) {
      logger.warn({ configPath }, 'Config file is not a YAML mapping, ignoring it');
      return null;
    }
    return { ...parsed };
  } catch (err) {
    logger.error({ configPath, err }, 'Failed to parse config, using defaults');
    return null;
  }
}

function readEnvOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (env['GEMINI_MCP_PROGRAM']) overrides['program'] = env['GEMINI_MCP_PROGRAM'];
  if (env['GEMINI_MCP_MODEL']) overrides['model'] = env['GEMINI_MCP_MODEL'];
  if (env['GEMINI_MCP_TIMEOUT_SECONDS']) overrides['timeout_seconds'] = Number(env['GEMINI_MCP_TIMEOUT_SECONDS']);
  return overrides;
}

export function loadConfig(options: LoadConfigOptions = {}): ConfigResult {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env['GEMINI_MCP_CONFIG'] ?? DEFAULT_CONFIG_PATH;

  const fileConfig = readConfigFile(configPath);
  const merged = { ...DEFAULT_CONFIG, ...(fileConfig ?? {}), ...readEnvOverrides(env) };

  const parsed = ServerConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new GeminiMcpError(GeminiMcpErrorCode.CONFIG_INVALID, `Invalid configuration: ${issues.join('; ')}`, {
      configPath,
      issues,
    });
  }
  return { config: parsed.data, configPath, fromFile: fileConfig !== null };
}
