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

export type SchemaName = 'daily_snapshot.v1' | 'realized_returns.v1';

const schemaCache = new Map<SchemaName, Schema>();

export function loadSchema(schemaName: SchemaName): Schema {
  const cached = schemaCache.get(schemaName);
  if (cached) {
    return cached;
  }

  const schemaPath = join(process.cwd(), 'schemas', `${schemaName}.schema.json`);
  const schema = JSON.parse(readFileSync(schemaPath, 'utf-8')) as Schema;

  schemaCache.set(schemaName, schema);
  return schema;
}
