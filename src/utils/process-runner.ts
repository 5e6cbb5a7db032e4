import { execFile } from 'child_process';
import type { CommandResult, CommandRunner } from '../interfaces/rotation-engine.interface.js';

const DEFAULT_MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

/**
 * CommandRunner over child_process.execFile. No shell, no timeout: a hung
 * child blocks until the scheduler terminates this process.
 */
export class ExecFileCommandRunner implements CommandRunner {
  constructor(private readonly maxOutputBytes: number = DEFAULT_MAX_OUTPUT_BYTES) {}

  run(command: string, args: readonly string[]): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      execFile(
        command,
        [...args],
        { encoding: 'utf-8', maxBuffer: this.maxOutputBytes },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ exitCode: 0, signal: null, stdout, stderr });
            return;
          }

          // String codes (ENOENT, EACCES, ...) mean the child never ran
          const code: unknown = error.code;
          if (typeof code === 'string') {
            reject(error);
            return;
          }

          resolve({
            exitCode: typeof code === 'number' ? code : null,
            signal: error.signal ?? null,
            stdout,
            stderr
          });
        }
      );
    });
  }
}
