import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { vi } from 'vitest';
import { z } from 'zod';
import { CONFIG } from '../constants/config-constants.js';
import type { CommandResult, CommandRunner } from '../interfaces/rotation-engine.interface.js';
import type { RotationStateStore, StateAccessReport } from '../interfaces/state-store.interface.js';
import {
  type FrozenMaintenanceConfig,
  type MaintenanceConfigInput,
  validateMaintenanceConfig
} from '../schemas/config.schema.js';
import { deepFreeze } from '../utils/immutability.js';

export const FIXED_NOW = new Date('2025-06-01T12:00:00.000Z');
export const VALID_STATE = 'logrotate state -- version 2\n"/app/logs/app_test.log" 2025-6-1-0:0:0\n';

const LogLineSchema = z.object({
  timestamp: z.string(),
  level: z.string(),
  message: z.string(),
  phase: z.string().optional(),
  event: z.string().optional(),
  status: z.number().optional()
}).passthrough();

export type CapturedLogLine = z.infer<typeof LogLineSchema>;

/**
 * Capture JSON log lines written to stdout
 */
export function captureLogs() {
  const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

  const lines = (): CapturedLogLine[] =>
    spy.mock.calls.map(([line]) => LogLineSchema.parse(JSON.parse(String(line))));

  return {
    lines,
    outcomes: (): CapturedLogLine[] => lines().filter(line => line.event === CONFIG.EVENT_PHASE_OUTCOME),
    errors: (): CapturedLogLine[] => lines().filter(line => line.level === CONFIG.LOG_LEVEL_ERROR),
    restore: (): void => spy.mockRestore()
  };
}

export function commandResult(overrides: Partial<CommandResult> = {}): CommandResult {
  return { exitCode: 0, signal: null, stdout: '', stderr: '', ...overrides };
}

/**
 * CommandRunner that records calls and replays a scripted result
 */
export class FakeCommandRunner implements CommandRunner {
  readonly calls: Array<{ command: string; args: readonly string[] }> = [];

  constructor(
    private readonly respond: (command: string, args: readonly string[]) => Promise<CommandResult> =
      async () => commandResult()
  ) {}

  run(command: string, args: readonly string[]): Promise<CommandResult> {
    this.calls.push({ command, args });
    return this.respond(command, args);
  }
}

export function enoent(message = 'spawn logrotate ENOENT'): NodeJS.ErrnoException {
  return Object.assign(new Error(message), { code: CONFIG.FS_ERROR_ENOENT });
}

export class MemoryStateStore implements RotationStateStore {
  initializeCalls = 0;

  constructor(
    private content: string | null = null,
    private readonly location = '/var/lib/logrotate/status'
  ) {}

  getLocation(): string {
    return this.location;
  }

  async verifyAccess(): Promise<StateAccessReport> {
    return { location: this.location, exists: this.content !== null };
  }

  async initialize(): Promise<boolean> {
    this.initializeCalls += 1;
    if (this.content !== null) {
      return false;
    }
    this.content = '';
    return true;
  }

  async read(): Promise<string | null> {
    return this.content;
  }

  async write(content: string): Promise<void> {
    this.content = content;
  }
}

export async function makeTempDir(prefix = 'log-maintenance-'): Promise<string> {
  return fs.mkdtemp(path.join(tmpdir(), prefix));
}

/**
 * Write a file whose mtime is `ageDays` before `now`
 */
export async function writeAgedFile(
  dir: string,
  name: string,
  ageDays: number,
  content = 'line\n',
  now: Date = FIXED_NOW
): Promise<string> {
  const filePath = path.join(dir, name);
  await fs.writeFile(filePath, content);
  const mtime = new Date(now.getTime() - ageDays * CONFIG.MS_PER_DAY);
  await fs.utimes(filePath, mtime, mtime);
  return filePath;
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.stat(filePath);
    return true;
  } catch {
    return false;
  }
}

export function buildConfig(input: Partial<MaintenanceConfigInput> = {}): FrozenMaintenanceConfig {
  return deepFreeze(validateMaintenanceConfig({ version: CONFIG.CONFIG_SCHEMA_VERSION, ...input }));
}

export function currentUid(): number {
  return process.getuid?.() ?? 0;
}
