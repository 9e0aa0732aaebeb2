import { z } from 'zod';
import { ANALYSIS_TYPES, AUDIT_TYPES } from '../prompts/templates.js';

export interface ToolDef {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: z.AnyZodObject;
}

const workingDirectory = z
  .string()
  .optional()
  .describe('Working directory to run gemini command from (optional, defaults to current directory)');

// Advertised as an enum, accepted as any string: an unknown value falls back
// to the table's default template.
function category<T extends readonly [string, ...string[]]>(values: T, description: string) {
  return z.union([z.enum(values), z.string()]).describe(description);
}

const toolDefs: readonly ToolDef[] = Object.freeze(([
  {
    name: 'gemini_analyze_files',
    description: 'Analyze specific files using Gemini CLI with @ syntax',
    inputSchema: z.object({
      files: z.array(z.string()).describe('List of file paths to analyze (relative to current working directory)'),
      prompt: z.string().describe('Analysis prompt to send to Gemini'),
      working_directory: workingDirectory,
    }),
  },
  {
    name: 'gemini_analyze_directories',
    description: 'Analyze entire directories using Gemini CLI with @ syntax',
    inputSchema: z.object({
      directories: z.array(z.string()).describe('List of directory paths to analyze'),
      prompt: z.string().describe('Analysis prompt to send to Gemini'),
      working_directory: workingDirectory,
    }),
  },
  {
    name: 'gemini_analyze_all_files',
    description: 'Analyze all files in current directory using Gemini CLI --all_files flag',
    inputSchema: z.object({
      prompt: z.string().describe('Analysis prompt to send to Gemini'),
      working_directory: workingDirectory,
    }),
  },
  {
    name: 'gemini_verify_implementation',
    description: 'Verify if specific features/patterns are implemented in the codebase',
    inputSchema: z.object({
      feature_name: z.string().describe("Name of the feature to verify (e.g., 'dark mode', 'JWT authentication')"),
      search_paths: z.array(z.string()).describe('List of directories/files to search in'),
      verification_prompt: z.string().optional().describe('Custom verification prompt (optional)'),
      working_directory: workingDirectory,
    }),
  },
  {
    name: 'gemini_security_audit',
    description: 'Perform security analysis of the codebase using Gemini',
    inputSchema: z.object({
      audit_type: category(AUDIT_TYPES, 'Type of security audit to perform'),
      paths: z.array(z.string()).describe('Paths to audit (files or directories)'),
      working_directory: workingDirectory,
    }),
  },
  {
    name: 'gemini_architecture_analysis',
    description: 'Analyze codebase architecture and patterns using Gemini',
    inputSchema: z.object({
      analysis_type: category(ANALYSIS_TYPES, 'Type of architectural analysis'),
      paths: z.array(z.string()).describe('Paths to analyze'),
      working_directory: workingDirectory,
    }),
  },
] satisfies ToolDef[]).map(def => Object.freeze(def)));

// Definitions are fixed at startup; callers get a fresh array each time.
export class ToolRegistry {
  private readonly byName: ReadonlyMap<string, ToolDef>;

  constructor(private readonly defs: readonly ToolDef[] = toolDefs) {
    this.byName = new Map(defs.map(d => [d.name, d]));
  }

  listTools(): ToolDef[] {
    return [...this.defs];
  }

  getTool(name: string): ToolDef | undefined {
    return this.byName.get(name);
  }
}
