import { describe, it, expect } from 'vitest';
import { buildJsonSchema } from './generate-schema.js';
import { TEXT } from '../src/constants/text-constants.js';

describe('buildJsonSchema', () => {
  it('should carry the schema metadata', () => {
    const schema = buildJsonSchema();

    expect(schema['$schema']).toBe('http://json-schema.org/draft-07/schema#');
    expect(schema['$id']).toBe('log-maintenance:v1.0.0:639938da:log-maintenance.config.schema.json');
    expect(schema['title']).toBe(TEXT.SCHEMA_TITLE);
    expect(schema['$ref']).toBe('#/definitions/MaintenanceConfig');
  });

  it('should describe retention days per log type', () => {
    const serialized = JSON.stringify(buildJsonSchema());

    expect(serialized).toContain(`"description":"${TEXT.SCHEMA_RETENTION_DAYS_DESC}"`);
  });
});
