// Process executor: every tool command passes through here. The binary is
// probed on the search path first; only when the probe succeeds is the real
// command spawned. Failures of any kind come back as an ExecutionResult.
import { run as defaultRunner, type CommandRunner } from '../shared/exec.js';
import type { CommandVector, ExecutionResult } from '../types.js';
import { logger } from '../logger.js';

export const BINARY_NOT_FOUND_MESSAGE = 'Gemini CLI not found. Please install gemini CLI first.';
export const TIMED_OUT_EXIT_CODE = 124;

/** Executor interface; CliExecutor is the only production implementation. */
export interface Executor {
  run(command: CommandVector, cwd?: string): Promise<ExecutionResult>;
}

export interface CliExecutorOptions {
  /** Program looked up by the probe, normally command[0]. */
  program: string;
  /** Lookup command, run as `<probeCommand> <program>`. */
  probeCommand?: string;
  timeoutMs?: number;
  maxBufferBytes?: number;
  runner?: CommandRunner;
}

export class CliExecutor implements Executor {
  private readonly probeCommand: string;
  private readonly runner: CommandRunner;

  constructor(private readonly options: CliExecutorOptions) {
    this.probeCommand = options.probeCommand ?? 'which';
    this.runner = options.runner ?? defaultRunner;
  }

  async run(command: CommandVector, cwd?: string): Promise<ExecutionResult> {
    const [file, ...args] = command;
    if (!file) {
      return { stdout: '', stderr: 'Error running gemini command: empty command', exitCode: 1 };
    }
    try {
      const probe = await this.runner(this.probeCommand, [this.options.program]);
      if (probe.exitCode !== 0) {
        logger.warn({ program: this.options.program, probe: this.probeCommand }, 'External program not found on PATH');
        return { stdout: '', stderr: BINARY_NOT_FOUND_MESSAGE, exitCode: 1 };
      }

      const started = performance.now();
      const result = await this.runner(file, args, {
        cwd: cwd ?? process.cwd(),
        timeoutMs: this.options.timeoutMs,
        maxBufferBytes: this.options.maxBufferBytes,
      });
      const durationMs = Math.round(performance.now() - started);
      logger.debug({ program: file, exitCode: result.exitCode, durationMs }, 'External program finished');

      if (result.timedOut) {
        const seconds = Math.round((this.options.timeoutMs ?? 0) / 1000);
        const notice = `${file} did not finish within ${seconds}s and was terminated`;
        return {
          stdout: result.stdout,
          stderr: result.stderr ? `${notice}\n${result.stderr}` : notice,
          exitCode: TIMED_OUT_EXIT_CODE,
        };
      }
      if (result.outputLimitExceeded) {
        const notice = `${file} produced more than ${this.options.maxBufferBytes ?? 0} bytes of output and was stopped`;
        logger.warn({ program: file, maxBufferBytes: this.options.maxBufferBytes }, 'External program exceeded the output limit');
        return {
          stdout: '',
          stderr: result.stderr ? `${notice}\n${result.stderr}` : notice,
          exitCode: 1,
        };
      }
      return { stdout: result.stdout, stderr: result.stderr, exitCode: result.exitCode };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ program: file, error: message }, 'Failed to run external program');
      return { stdout: '', stderr: `Error running gemini command: ${message}`, exitCode: 1 };
    }
  }
}
