/**
 * External command execution
 */

import { type ExecFileOptions, execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { CommandExecutionError } from '../../core/errors.js';
import { getComponentLogger } from '../../core/logging/index.js';
import { isRecord } from '../../utils/type-guards.js';

const execFileAsync = promisify(execFile);

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandOptions {
  /** Kill the program after this long */
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Runs a program without a shell. A non-zero exit is reported in the
 * result, not thrown; a program that cannot be started, times out or is
 * aborted throws.
 */
export interface CommandRunner {
  run(command: string, args: readonly string[], options?: CommandOptions): Promise<CommandResult>;
}

export type ExecFileFn = (
  file: string,
  args: string[],
  options: ExecFileOptions & { encoding: 'utf8' }
) => Promise<{ stdout: string; stderr: string }>;

const MAX_BUFFER = 16 * 1024 * 1024;

export class ExecFileCommandRunner implements CommandRunner {
  private logger = getComponentLogger('command-runner');

  constructor(private readonly exec: ExecFileFn = (file, args, options) => execFileAsync(file, args, options)) {}

  async run(command: string, args: readonly string[], options: CommandOptions = {}): Promise<CommandResult> {
    this.logger.debug('Running command', { command, args, timeoutMs: options.timeoutMs });
    const label = `${command} ${args.slice(0, 3).join(' ')}`;
    try {
      const { stdout, stderr } = await this.exec(command, [...args], {
        maxBuffer: MAX_BUFFER,
        encoding: 'utf8',
        ...(options.timeoutMs ? { timeout: options.timeoutMs } : {}),
        ...(options.signal ? { signal: options.signal } : {}),
      });
      return { stdout, stderr, exitCode: 0 };
    } catch (error) {
      if (!isRecord(error)) {
        throw error;
      }
      if (error.name === 'AbortError' || error.code === 'ABORT_ERR') {
        throw new CommandExecutionError(`${label} was cancelled`, command, args, null, '');
      }
      if (error.killed === true) {
        throw new CommandExecutionError(
          options.timeoutMs ? `${label} timed out after ${options.timeoutMs}ms` : `${label} was killed`,
          command,
          args,
          null,
          typeof error.stderr === 'string' ? error.stderr : ''
        );
      }
      if (typeof error.code === 'number') {
        return {
          stdout: typeof error.stdout === 'string' ? error.stdout : '',
          stderr: typeof error.stderr === 'string' ? error.stderr : '',
          exitCode: error.code,
        };
      }
      const message = typeof error.message === 'string' ? error.message : String(error.code);
      throw new CommandExecutionError(
        error.code === 'ENOENT'
          ? `'${command}' was not found on PATH`
          : `Failed to run '${command}': ${message}`,
        command,
        args,
        null,
        ''
      );
    }
  }
}

/**
 * Error for a result that exited non-zero
 */
export function commandFailure(command: string, args: readonly string[], result: CommandResult): CommandExecutionError {
  const detail = result.stderr.trim().split('\n').slice(-3).join(' ') || `exit code ${result.exitCode}`;
  return new CommandExecutionError(
    `${command} ${args.slice(0, 3).join(' ')} failed: ${detail}`,
    command,
    args,
    result.exitCode,
    result.stderr
  );
}
