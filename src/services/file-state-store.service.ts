import { promises as fs } from 'fs';
import type { Stats } from 'fs';
import * as path from 'path';
import { CONFIG } from '../constants/config-constants.js';
import type { RotationStateStore, StateAccessReport } from '../interfaces/state-store.interface.js';
import { StateStoreError, describeError, hasErrorCode } from '../utils/errors.js';

export interface FileStateStoreOptions {
  /** uid that must own the state file and its directory */
  ownerUid?: number;
}

/**
 * Rotation state kept in a single file, the format of which belongs to the
 * rotation utility. The service runtime identity must not be able to write it.
 */
export class FileRotationStateStore implements RotationStateStore {
  private readonly location: string;
  private readonly ownerUid: number;

  constructor(location: string, options: FileStateStoreOptions = {}) {
    this.location = path.resolve(location);
    this.ownerUid = options.ownerUid ?? CONFIG.DEFAULT_STATE_OWNER_UID;
  }

  getLocation(): string {
    return this.location;
  }

  async verifyAccess(): Promise<StateAccessReport> {
    const directory = path.dirname(this.location);
    const dirStats = await this.statOrNull(directory);
    if (dirStats) {
      this.assertSafe(dirStats, directory);
    }

    const fileStats = await this.statOrNull(this.location);
    if (!fileStats) {
      return { location: this.location, exists: false };
    }

    this.assertSafe(fileStats, this.location);
    return {
      location: this.location,
      exists: true,
      ownerUid: fileStats.uid,
      mode: fileStats.mode & 0o777
    };
  }

  async initialize(): Promise<boolean> {
    await fs.mkdir(path.dirname(this.location), {
      recursive: true,
      mode: CONFIG.STATE_DIR_MODE
    });

    try {
      // 'wx' fails when the file already exists, leaving its content alone
      await fs.writeFile(this.location, '', {
        encoding: CONFIG.DEFAULT_ENCODING,
        flag: 'wx',
        mode: CONFIG.STATE_FILE_MODE
      });
      return true;
    } catch (error) {
      if (hasErrorCode(error, 'EEXIST')) {
        return false;
      }
      throw error;
    }
  }

  async read(): Promise<string | null> {
    let content: string;
    try {
      content = await fs.readFile(this.location, CONFIG.DEFAULT_ENCODING);
    } catch (error) {
      if (hasErrorCode(error, CONFIG.FS_ERROR_ENOENT)) {
        return null;
      }
      throw new StateStoreError('unreadable', this.location, describeError(error));
    }

    this.assertRecognizedFormat(content);
    return content;
  }

  async write(content: string): Promise<void> {
    const tempPath = `${this.location}${CONFIG.STATE_TEMP_SUFFIX}`;
    await fs.writeFile(tempPath, content, {
      encoding: CONFIG.DEFAULT_ENCODING,
      mode: CONFIG.STATE_FILE_MODE
    });
    await fs.rename(tempPath, this.location);
  }

  private assertRecognizedFormat(content: string): void {
    if (content.trim().length === 0) {
      return;
    }

    const firstLine = content.split(CONFIG.LINE_ENDING_PATTERN)[0] ?? '';
    if (!CONFIG.STATE_HEADER_PATTERN.test(firstLine.trim())) {
      throw new StateStoreError('corrupt', this.location, `unexpected header "${firstLine.slice(0, 80)}"`);
    }
  }

  private assertSafe(stats: Stats, target: string): void {
    if (stats.uid !== this.ownerUid) {
      throw new StateStoreError(
        'permissions',
        this.location,
        `${target} is owned by uid ${stats.uid}, expected ${this.ownerUid}`
      );
    }

    if ((stats.mode & CONFIG.STATE_FORBIDDEN_MODE_BITS) !== 0) {
      throw new StateStoreError(
        'permissions',
        this.location,
        `${target} is writable by group or others (mode ${(stats.mode & 0o777).toString(8)})`
      );
    }
  }

  private async statOrNull(target: string): Promise<Stats | null> {
    try {
      return await fs.stat(target);
    } catch (error) {
      if (hasErrorCode(error, CONFIG.FS_ERROR_ENOENT)) {
        return null;
      }
      throw new StateStoreError('unreadable', this.location, describeError(error));
    }
  }
}
