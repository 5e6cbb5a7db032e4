import { describe, it, expect } from 'vitest';
import { generateSchemaId, getJsonSchemaDraft, getSchemaName } from './schema-metadata.js';
import { CONFIG } from '../constants/config-constants.js';

describe('Schema Metadata Utilities', () => {
  describe('generateSchemaId', () => {
    it('should generate a deterministic schema ID', () => {
      expect(generateSchemaId()).toBe(generateSchemaId());
    });

    it('should follow the prefix:version:hash:filename format', () => {
      expect(generateSchemaId()).toBe(
        'log-maintenance:v1.0.0:639938da:log-maintenance.config.schema.json'
      );
    });

    it('should not depend on the working directory', () => {
      const id = generateSchemaId();

      expect(id).not.toContain(process.cwd());
      expect(id).not.toContain('/');
    });
  });

  describe('getJsonSchemaDraft', () => {
    it('should return the draft-07 URL', () => {
      expect(getJsonSchemaDraft()).toBe(CONFIG.JSON_SCHEMA_DRAFT);
      expect(getJsonSchemaDraft()).toContain('draft-07');
    });
  });

  describe('getSchemaName', () => {
    it('should return the schema name from constants', () => {
      expect(getSchemaName()).toBe('MaintenanceConfig');
    });
  });
});
