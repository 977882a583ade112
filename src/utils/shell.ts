/**
 * Run a command line through the host shell and capture its output.
 */
import { exec, type ExecException } from 'node:child_process';
import { promisify } from 'node:util';

const execAsync = promisify(exec);

/** Hook output can be long (package installs); allow 16 MiB per stream. */
const MAX_BUFFER = 16 * 1024 * 1024;

export interface ShellResult {
  /** Exit status; null when the process could not be started or was killed */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Why the process did not run to an exit status */
  error?: string;
}

/**
 * Executes one command line in `cwd`. Must not throw for a non-zero exit.
 */
export type CommandExecutor = (command: string, cwd: string) => Promise<ShellResult>;

type ExecFailure = ExecException & { stdout?: string; stderr?: string };

function isExecFailure(error: unknown): error is ExecFailure {
  return error instanceof Error && ('code' in error || 'signal' in error);
}

/**
 * Run `command` through the shell with `cwd` as its working directory.
 * The calling process's own working directory is left untouched.
 */
export const runShellCommand: CommandExecutor = async (command, cwd) => {
  try {
    const { stdout, stderr } = await execAsync(command, {
      cwd,
      encoding: 'utf-8',
      maxBuffer: MAX_BUFFER,
    });
    return { exitCode: 0, stdout, stderr };
  } catch (error) {
    if (!isExecFailure(error)) {
      throw error;
    }
    const stdout = typeof error.stdout === 'string' ? error.stdout : '';
    const stderr = typeof error.stderr === 'string' ? error.stderr : '';
    if (typeof error.code === 'number') {
      return { exitCode: error.code, stdout, stderr };
    }
    // spawn failures (missing cwd, killed by signal) carry no numeric exit code
    return {
      exitCode: null,
      stdout,
      stderr,
      error: error.signal ? `terminated by ${error.signal}` : error.message,
    };
  }
};
