import { constants as osConstants } from 'os';
import { CONFIG } from '../constants/config-constants.js';
import { TEXT } from '../constants/text-constants.js';
import type { CommandResult, CommandRunner, RotationEngine } from '../interfaces/rotation-engine.interface.js';
import type { PhaseOutcome } from '../interfaces/phase-outcome.interface.js';
import type { RotationStateStore } from '../interfaces/state-store.interface.js';
import { StateStoreError, hasErrorCode } from '../utils/errors.js';
import { writeDebug, writeInfo, writeWarn } from '../utils/logging.js';
import { failed, succeeded } from '../utils/outcome.js';
import { ExecFileCommandRunner } from '../utils/process-runner.js';

export interface LogrotateEngineOptions {
  bin: string;
  rulesPath: string;
  verbose?: boolean;
}

/**
 * Delegates rotation to logrotate. The state store is handed in so that
 * its location and first-run initialization stay explicit.
 */
export class LogrotateEngine implements RotationEngine {
  private readonly phase = CONFIG.PHASE_ROTATION;

  constructor(
    private readonly stateStore: RotationStateStore,
    private readonly options: LogrotateEngineOptions,
    private readonly runner: CommandRunner = new ExecFileCommandRunner()
  ) {}

  buildArgs(): string[] {
    const args: string[] = [CONFIG.LOGROTATE_FLAG_STATE, this.stateStore.getLocation()];
    if (this.options.verbose) {
      args.push(CONFIG.LOGROTATE_FLAG_VERBOSE);
    }
    args.push(this.options.rulesPath);
    return args;
  }

  async rotate(): Promise<PhaseOutcome> {
    try {
      await this.prepareState();
    } catch (error) {
      if (error instanceof StateStoreError) {
        return failed(CONFIG.EXIT_CODE_ERROR, 'state_store', error.message);
      }
      throw error;
    }

    let result: CommandResult;
    try {
      writeDebug(`Executing ${this.options.bin}`, { phase: this.phase, args: this.buildArgs() });
      result = await this.runner.run(this.options.bin, this.buildArgs());
    } catch (error) {
      if (hasErrorCode(error, CONFIG.FS_ERROR_ENOENT)) {
        return failed(
          CONFIG.EXIT_CODE_MISSING_DEPENDENCY,
          'missing_dependency',
          `${TEXT.ERROR_ROTATION_BINARY_MISSING}: ${this.options.bin}`
        );
      }
      throw error;
    }

    this.logOutput(result);
    return this.toOutcome(result);
  }

  private async prepareState(): Promise<void> {
    const created = await this.stateStore.initialize();
    if (created) {
      writeInfo(TEXT.STATE_INITIALIZED, { phase: this.phase, location: this.stateStore.getLocation() });
    }
    // Validates the header; content is otherwise left to logrotate
    await this.stateStore.read();
  }

  private toOutcome(result: CommandResult): PhaseOutcome {
    if (result.signal) {
      const signalNumber = osConstants.signals[result.signal];
      return failed(
        CONFIG.SIGNAL_EXIT_CODE_BASE + signalNumber,
        'signal',
        `${TEXT.ERROR_ROTATION_SIGNALLED} ${result.signal}`
      );
    }

    if (result.exitCode === CONFIG.EXIT_CODE_SUCCESS) {
      return succeeded();
    }

    const code = result.exitCode ?? CONFIG.EXIT_CODE_ERROR;
    const detail = this.lastLine(result.stderr);
    return failed(
      code,
      'exit_status',
      detail ? `${TEXT.ERROR_ROTATION_EXITED} ${code}: ${detail}` : `${TEXT.ERROR_ROTATION_EXITED} ${code}`
    );
  }

  private logOutput(result: CommandResult): void {
    for (const line of this.lines(result.stdout)) {
      writeDebug(line, { phase: this.phase, stream: 'stdout' });
    }
    for (const line of this.lines(result.stderr)) {
      writeWarn(line, { phase: this.phase, stream: 'stderr' });
    }
  }

  private lines(output: string): string[] {
    return output.split(CONFIG.LINE_ENDING_PATTERN).filter(line => line.trim().length > 0);
  }

  private lastLine(output: string): string | undefined {
    const lines = this.lines(output);
    return lines[lines.length - 1];
  }
}
