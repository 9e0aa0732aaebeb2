import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import type { Executor } from '../../src/execution/executor.js';
import { DEFAULT_CONFIG } from '../../src/config/loader.js';
import {
  callTool,
  createDeps,
  createServer,
  getPromptResult,
  listPromptsResult,
  listToolsResult,
  toMcpError,
} from '../../src/server.js';
import { GeminiMcpError, GeminiMcpErrorCode } from '../../src/shared/errors.js';
import type { CommandVector, ExecutionResult } from '../../src/types.js';

function depsWith(result: ExecutionResult) {
  const run = jest.fn<Promise<ExecutionResult>, [CommandVector, string?]>().mockResolvedValue(result);
  const executor: Executor = { run };
  return { run, deps: createDeps(DEFAULT_CONFIG, executor) };
}

describe('listToolsResult', () => {
  const { deps } = depsWith({ stdout: '', stderr: '', exitCode: 0 });
  const { tools } = listToolsResult(deps.registry);

  it('exposes six object schemas', () => {
    expect(tools).toHaveLength(6);
    for (const tool of tools) {
      expect(tool.inputSchema.type).toBe('object');
    }
  });

  it('lists required arguments and leaves working_directory optional', () => {
    const files = tools.find(t => t.name === 'gemini_analyze_files');
    expect(files?.inputSchema.required).toEqual(['files', 'prompt']);
    expect(Object.keys(files?.inputSchema.properties ?? {})).toEqual(['files', 'prompt', 'working_directory']);
  });

  it('advertises the audit categories', () => {
    const audit = tools.find(t => t.name === 'gemini_security_audit');
    expect(JSON.stringify(audit?.inputSchema.properties?.['audit_type'])).toContain('"input_validation"');
  });
});

describe('callTool', () => {
  it('wraps stdout in a single text item', async () => {
    const { deps } = depsWith({ stdout: 'looks fine\n', stderr: '', exitCode: 0 });
    expect(await callTool(deps.dispatcher, 'gemini_analyze_all_files', { prompt: 'x' }))
      .toEqual({ content: [{ type: 'text', text: 'looks fine\n' }] });
  });

  it('flags a failed run as an error result', async () => {
    const { deps } = depsWith({ stdout: '', stderr: 'bad flag', exitCode: 2 });
    expect(await callTool(deps.dispatcher, 'gemini_analyze_all_files', { prompt: 'x' }))
      .toEqual({ content: [{ type: 'text', text: 'Error: bad flag' }], isError: true });
  });

  it('answers an unknown tool without faulting', async () => {
    const { deps, run } = depsWith({ stdout: '', stderr: '', exitCode: 0 });
    expect(await callTool(deps.dispatcher, 'no_such_tool', {}))
      .toEqual({ content: [{ type: 'text', text: 'Unknown tool: no_such_tool' }] });
    expect(run).not.toHaveBeenCalled();
  });

  it('turns a missing argument into InvalidParams', async () => {
    const { deps } = depsWith({ stdout: '', stderr: '', exitCode: 0 });
    await expect(callTool(deps.dispatcher, 'gemini_analyze_directories', { prompt: 'x' }))
      .rejects.toMatchObject({ code: ErrorCode.InvalidParams, data: { code: 'MISSING_ARGUMENT', argument: 'directories' } });
  });
});

describe('prompts', () => {
  const { deps } = depsWith({ stdout: '', stderr: '', exitCode: 0 });

  it('lists the catalog', () => {
    const { prompts } = listPromptsResult(deps.catalog);
    expect(prompts.map(p => p.name)).toContain('gemini-overview');
    expect(prompts.find(p => p.name === 'gemini-verify')?.arguments?.[0]).toEqual({
      name: 'feature',
      description: "Feature to look for, e.g. 'JWT authentication'",
      required: true,
    });
  });

  it('returns the rendered instruction', () => {
    const result = getPromptResult(deps.catalog, 'gemini-overview', {});
    expect(result.messages[0]?.content).toMatchObject({ type: 'text' });
  });

  it('raises InvalidParams for an unknown prompt', () => {
    expect(() => getPromptResult(deps.catalog, 'gemini-unknown', {})).toThrow(McpError);
    expect(() => getPromptResult(deps.catalog, 'gemini-unknown', {})).toThrow('Unknown prompt: gemini-unknown');
  });
});

describe('toMcpError', () => {
  it('leaves errors that are not request problems untouched', () => {
    const err = new GeminiMcpError(GeminiMcpErrorCode.SPAWN_FAILED, 'spawn failed');
    expect(toMcpError(err)).toBe(err);
  });
});

describe('createServer', () => {
  it('builds a server over the given dependencies', () => {
    const { deps } = depsWith({ stdout: '', stderr: '', exitCode: 0 });
    expect(createServer(deps)).toBeDefined();
  });
});
