import { CONFIG } from '../constants/config-constants.js';
import { createHash } from 'crypto';

/**
 * Deterministic schema ID built from the prefix, version and filename
 */
export function generateSchemaId(): string {
  const components = [
    CONFIG.JSON_SCHEMA_ID_PREFIX,
    CONFIG.JSON_SCHEMA_VERSION,
    CONFIG.JSON_SCHEMA_FILENAME
  ];

  const hash = createHash('sha256')
    .update(components.join(':'))
    .digest('hex')
    .substring(0, 8);

  // Format: prefix:version:hash:filename
  return `${CONFIG.JSON_SCHEMA_ID_PREFIX}:${CONFIG.JSON_SCHEMA_VERSION}:${hash}:${CONFIG.JSON_SCHEMA_FILENAME}`;
}

export function getJsonSchemaDraft(): string {
  return CONFIG.JSON_SCHEMA_DRAFT;
}

export function getSchemaName(): string {
  return CONFIG.JSON_SCHEMA_NAME;
}
