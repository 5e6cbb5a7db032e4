import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { CONFIG } from '../constants/config-constants.js';

/**
 * True when the module at `moduleUrl` is the script node was started with,
 * including when it was reached through an npm bin symlink.
 */
export function isEntryPoint(moduleUrl: string, argv: readonly string[] = process.argv): boolean {
  const script = argv[1];
  if (!script) {
    return false;
  }

  if (moduleUrl === `${CONFIG.FILE_URL_SCHEME}${script}`) {
    return true;
  }

  try {
    return moduleUrl === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}
