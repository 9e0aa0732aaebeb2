import type { PathKind } from '../paths/annotator.js';
import {
  ARCHITECTURE_TEMPLATES,
  SECURITY_AUDIT_TEMPLATES,
  type TemplateTable,
} from '../prompts/templates.js';

/** Where the instruction half of the final prompt comes from. */
export type PromptSource =
  | { kind: 'argument'; argument: string }
  | { kind: 'template'; argument: string; table: TemplateTable }
  | { kind: 'verification'; argument: string };

/**
 * How one tool turns its arguments into a command. The dispatcher interprets
 * these records; no tool has code of its own.
 */
export interface ToolRecipe {
  /** Argument holding the list of paths to reference in the prompt. */
  readonly pathArgument?: string;
  /** Forces every path to this kind instead of probing the filesystem. */
  readonly pathKind?: PathKind;
  readonly prompt: PromptSource;
  /** Non-empty value of this argument replaces the resolved prompt text. */
  readonly overrideArgument?: string;
  /** Adds --all_files; such tools take no paths. */
  readonly allFiles?: boolean;
}

export type RecipeTable = ReadonlyMap<string, ToolRecipe>;

export function createRecipeTable(): RecipeTable {
  return new Map<string, ToolRecipe>([
    ['gemini_analyze_files', {
      pathArgument: 'files',
      prompt: { kind: 'argument', argument: 'prompt' },
    }],
    ['gemini_analyze_directories', {
      pathArgument: 'directories',
      pathKind: 'directory',
      prompt: { kind: 'argument', argument: 'prompt' },
    }],
    ['gemini_analyze_all_files', {
      allFiles: true,
      prompt: { kind: 'argument', argument: 'prompt' },
    }],
    ['gemini_verify_implementation', {
      pathArgument: 'search_paths',
      prompt: { kind: 'verification', argument: 'feature_name' },
      overrideArgument: 'verification_prompt',
    }],
    ['gemini_security_audit', {
      pathArgument: 'paths',
      prompt: { kind: 'template', argument: 'audit_type', table: SECURITY_AUDIT_TEMPLATES },
    }],
    ['gemini_architecture_analysis', {
      pathArgument: 'paths',
      prompt: { kind: 'template', argument: 'analysis_type', table: ARCHITECTURE_TEMPLATES },
    }],
  ]);
}
