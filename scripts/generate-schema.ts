#!/usr/bin/env node

import { zodToJsonSchema } from 'zod-to-json-schema';
import { MaintenanceConfigSchema } from '../src/schemas/config.schema.js';
import { promises as fs } from 'fs';
import path from 'path';
import { CONFIG } from '../src/constants/config-constants.js';
import { TEXT } from '../src/constants/text-constants.js';
import { generateSchemaId, getJsonSchemaDraft, getSchemaName } from '../src/utils/schema-metadata.js';
import { isEntryPoint } from '../src/utils/entry-point.js';
import { describeError } from '../src/utils/errors.js';
import { writeError, writeInfo } from '../src/utils/logging.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function lookup(root: unknown, keys: readonly string[]): Record<string, unknown> | undefined {
  let current: unknown = root;
  for (const key of keys) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return isRecord(current) ? current : undefined;
}

export function buildJsonSchema(): Record<string, unknown> {
  const jsonSchema = zodToJsonSchema(MaintenanceConfigSchema, {
    name: getSchemaName(),
    $refStrategy: 'none',
    errorMessages: true,
    markdownDescription: true,
  });

  const schemaWithMetadata: Record<string, unknown> = {
    $schema: getJsonSchemaDraft(),
    $id: generateSchemaId(),
    title: TEXT.SCHEMA_TITLE,
    description: TEXT.SCHEMA_DESCRIPTION,
    ...jsonSchema,
  };

  const retentionDays = lookup(schemaWithMetadata, [
    'definitions', getSchemaName(), 'properties', 'retention', 'properties', 'days'
  ]);
  if (retentionDays) {
    retentionDays['description'] = TEXT.SCHEMA_RETENTION_DAYS_DESC;
  }

  return schemaWithMetadata;
}

async function generateJsonSchema(): Promise<void> {
  const outputPath = path.join(process.cwd(), CONFIG.JSON_SCHEMA_FILENAME);
  await fs.writeFile(
    outputPath,
    JSON.stringify(buildJsonSchema(), null, CONFIG.JSON_INDENT_SIZE) + '\n',
    CONFIG.DEFAULT_ENCODING
  );
  writeInfo(`${TEXT.SCHEMA_GENERATION_SUCCESS}: ${outputPath}`);
}

if (isEntryPoint(import.meta.url)) {
  generateJsonSchema().catch((error: unknown) => {
    writeError(TEXT.SCHEMA_GENERATION_FAILED, {
      code: CONFIG.ERROR_CODE_EXECUTION_FAILED,
      error: describeError(error)
    });
    process.exitCode = CONFIG.EXIT_CODE_ERROR;
  });
}

export { generateJsonSchema };
