/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { join } from 'path';

export interface Schema {
  $schema: string;
  $id: string;
  type: string;
  required?: string[];
  properties?: Record<string, unknown>;
}

const schemaCache = new Map<string, Schema>();

export function loadSchema(schemaName: string): Schema {
  const cached = schemaCache.get(schemaName);
  if (cached) {
    return cached;
  }

  const projectRoot = process.cwd();
  const schemaPath = join(projectRoot, 'schemas', `${schemaName}.schema.json`);
  const schemaJson = readFileSync(schemaPath, 'utf-8');
  const schema = JSON.parse(schemaJson) as Schema;

  schemaCache.set(schemaName, schema);
  return schema;
}

export function getRunContextSchema(): Schema {
  return loadSchema('run_context.v1');
}

export function getFactorEngineConfigSchema(): Schema {
  return loadSchema('factor_engine_config.v1');
}
