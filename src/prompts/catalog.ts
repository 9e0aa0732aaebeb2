/**
 * Meta-prompts. Each entry renders an instruction telling the calling agent
 * which analysis tool to call and with what arguments; the catalog itself
 * never dispatches anything.
 */
import { GeminiMcpError, GeminiMcpErrorCode, missingArgument } from '../shared/errors.js';

export interface PromptArgumentDef {
  readonly name: string;
  readonly description: string;
  readonly required: boolean;
}

export interface PromptDef {
  readonly name: string;
  readonly description: string;
  readonly arguments: readonly PromptArgumentDef[];
}

// Type aliases rather than interfaces so payloads stay assignable to the
// SDK's index-signature result types.
export type PromptMessage = {
  role: 'user';
  content: { type: 'text'; text: string };
};

export type PromptPayload = {
  description: string;
  messages: PromptMessage[];
};

export type PromptArgs = Record<string, string | undefined>;

export interface ToolInstruction {
  tool: string;
  arguments: Record<string, unknown>;
  /** Extra guidance appended after the call instruction. */
  followUp?: string;
}

export interface PromptEntry extends PromptDef {
  render(args: PromptArgs): ToolInstruction;
}

const DEFAULT_SCOPE = ['.'];

/** "src, lib/util.ts" → ["src", "lib/util.ts"]; blank input → undefined. */
export function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const items = value.split(',').map(s => s.trim()).filter(Boolean);
  return items.length > 0 ? items : undefined;
}

function required(prompt: string, args: PromptArgs, name: string): string {
  const value = args[name]?.trim();
  if (!value) throw missingArgument(prompt, name);
  return value;
}

const promptEntries: readonly PromptEntry[] = [
  {
    name: 'gemini-analyze',
    description: 'Ask Gemini a question about specific files',
    arguments: [
      { name: 'paths', description: 'Comma-separated file paths to analyze', required: true },
      { name: 'question', description: 'What to ask about the files', required: false },
    ],
    render(args) {
      const files = splitList(required('gemini-analyze', args, 'paths'));
      if (!files) throw missingArgument('gemini-analyze', 'paths');
      return {
        tool: 'gemini_analyze_files',
        arguments: {
          files,
          prompt: args['question']?.trim() || 'Explain what this code does, how it is structured, and any notable issues.',
        },
      };
    },
  },
  {
    name: 'gemini-audit',
    description: 'Run a focused security audit with Gemini',
    arguments: [
      { name: 'audit_type', description: 'sql_injection, xss, auth, general or input_validation', required: true },
      { name: 'paths', description: 'Comma-separated paths to audit (defaults to the project root)', required: false },
    ],
    render(args) {
      return {
        tool: 'gemini_security_audit',
        arguments: {
          audit_type: required('gemini-audit', args, 'audit_type'),
          paths: splitList(args['paths']) ?? DEFAULT_SCOPE,
        },
        followUp: 'Summarize the findings by severity and point to the affected files.',
      };
    },
  },
  {
    name: 'gemini-arch',
    description: 'Analyze the architecture of the codebase with Gemini',
    arguments: [
      { name: 'analysis_type', description: 'overview, dependencies, patterns, structure or coupling', required: false },
      { name: 'paths', description: 'Comma-separated paths to analyze (defaults to the project root)', required: false },
    ],
    render(args) {
      return {
        tool: 'gemini_architecture_analysis',
        arguments: {
          analysis_type: args['analysis_type']?.trim() || 'overview',
          paths: splitList(args['paths']) ?? DEFAULT_SCOPE,
        },
      };
    },
  },
  {
    name: 'gemini-verify',
    description: 'Check whether a feature is implemented in the codebase',
    arguments: [
      { name: 'feature', description: "Feature to look for, e.g. 'JWT authentication'", required: true },
      { name: 'paths', description: 'Comma-separated paths to search (defaults to the project root)', required: false },
    ],
    render(args) {
      return {
        tool: 'gemini_verify_implementation',
        arguments: {
          feature_name: required('gemini-verify', args, 'feature'),
          search_paths: splitList(args['paths']) ?? DEFAULT_SCOPE,
        },
        followUp: 'Report whether the feature exists and list the files and functions involved.',
      };
    },
  },
  {
    name: 'gemini-overview',
    description: 'Get a whole-project overview from Gemini',
    arguments: [
      { name: 'focus', description: 'Optional area to emphasize in the overview', required: false },
    ],
    render(args) {
      const focus = args['focus']?.trim();
      const base = 'Give a high-level overview of this project: its purpose, main components, and how they fit together.';
      return {
        tool: 'gemini_analyze_all_files',
        arguments: { prompt: focus ? `${base} Focus on ${focus}.` : base },
      };
    },
  },
];

function renderInstruction(instruction: ToolInstruction): string {
  const lines = [
    `Call the \`${instruction.tool}\` tool with these arguments:`,
    '',
    '```json',
    JSON.stringify(instruction.arguments, null, 2),
    '```',
  ];
  if (instruction.followUp) lines.push('', instruction.followUp);
  return lines.join('\n');
}

export class PromptCatalog {
  private readonly byName: ReadonlyMap<string, PromptEntry>;

  constructor(private readonly entries: readonly PromptEntry[] = promptEntries) {
    this.byName = new Map(entries.map(e => [e.name, e]));
  }

  listPrompts(): PromptDef[] {
    return this.entries.map(({ name, description, arguments: args }) => ({ name, description, arguments: args }));
  }

  getPrompt(name: string, args: PromptArgs = {}): PromptPayload {
    const entry = this.byName.get(name);
    if (!entry) {
      throw new GeminiMcpError(GeminiMcpErrorCode.UNKNOWN_PROMPT, `Unknown prompt: ${name}`, { prompt: name });
    }
    return {
      description: entry.description,
      messages: [{ role: 'user', content: { type: 'text', text: renderInstruction(entry.render(args)) } }],
    };
  }
}
