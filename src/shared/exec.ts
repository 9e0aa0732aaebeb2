import execa, { type ExecaChildProcess, type ExecaError } from 'execa';
import { GeminiMcpError, GeminiMcpErrorCode } from './errors.js';

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
  /** Set when stdout or stderr outgrew `maxBufferBytes` and the process was stopped. */
  outputLimitExceeded?: boolean;
  signal?: string;
}

export interface RunOptions {
  cwd?: string;
  timeoutMs?: number;
  maxBufferBytes?: number;
}

/** Signature shared by `run` and the test doubles that stand in for it. */
export type CommandRunner = (command: string, args: string[], options?: RunOptions) => Promise<ExecResult>;

// execa sends SIGTERM when `timeout` fires and SIGKILL 5 s later if the
// process is still alive. The same grace period applies when the output
// limit stops a process.
const FORCE_KILL_AFTER_MS = 5_000;

function isExecaError(err: unknown): err is ExecaError {
  return err instanceof Error && 'failed' in err && 'isCanceled' in err;
}

function isMaxBufferError(err: ExecaError): boolean {
  return /maxBuffer exceeded/.test(err.originalMessage ?? err.shortMessage);
}

/**
 * Runs a command to completion with stdin closed and both output streams buffered.
 * A nonzero exit, a timeout or a signal resolves normally; only a process that
 * could not be started at all rejects, with SPAWN_FAILED.
 */
export async function run(command: string, args: string[], options?: RunOptions): Promise<ExecResult> {
  let subprocess: ExecaChildProcess | undefined;
  try {
    subprocess = execa(command, args, {
      cwd: options?.cwd,
      timeout: options?.timeoutMs,
      maxBuffer: options?.maxBufferBytes,
      stdin: 'ignore',
      stripFinalNewline: false,
    });
    const result = await subprocess;
    return { stdout: result.stdout, stderr: result.stderr, exitCode: result.exitCode, timedOut: false };
  } catch (err) {
    if (isExecaError(err)) {
      if (err.timedOut) {
        return { stdout: err.stdout ?? '', stderr: err.stderr ?? '', exitCode: 124, timedOut: true, signal: err.signal };
      }
      if (isMaxBufferError(err)) {
        // The process may still be running once its output is cut off.
        subprocess?.kill('SIGTERM', { forceKillAfterTimeout: FORCE_KILL_AFTER_MS });
        return { stdout: err.stdout ?? '', stderr: err.stderr ?? '', exitCode: 1, timedOut: false, outputLimitExceeded: true };
      }
      if (typeof err.exitCode === 'number') {
        return { stdout: err.stdout ?? '', stderr: err.stderr ?? '', exitCode: err.exitCode, timedOut: false };
      }
      if (err.signal) {
        return { stdout: err.stdout ?? '', stderr: err.stderr ?? '', exitCode: 128, timedOut: false, signal: err.signal };
      }
    }
    const cause = isExecaError(err)
      ? err.originalMessage ?? err.shortMessage
      : err instanceof Error ? err.message : String(err);
    throw new GeminiMcpError(GeminiMcpErrorCode.SPAWN_FAILED, `Command failed to spawn: ${command}: ${cause}`, {
      command,
      cause,
    });
  }
}
