/** Program name, flags and final prompt, in spawn order. Built fresh per call. */
export type CommandVector = readonly string[];

export interface ExecutionResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
}

/** Text relayed back as the single content item of a tools/call result. */
export interface ToolResponse {
  readonly text: string;
  readonly isError: boolean;
}
