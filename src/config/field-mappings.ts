import * as fs from 'node:fs';
import { z } from 'zod';
import { ConfigError, asError, describeError } from '../common/pipeline-error';

export const FIELD_MAPPINGS = Symbol('FIELD_MAPPINGS');

/**
 * One hand-maintained table: raw API variable name -> field identity,
 * bound to a single measurement.
 */
export interface MappingTable {
  measurement: string;
  fields: Readonly<Record<string, string>>;
}

/**
 * Tables in priority order plus the forced-string allow-list.
 */
export interface FieldMappings {
  tables: MappingTable[];
  stringFields: string[];
}

const mappingsSchema = z.object({
  tables: z
    .array(
      z.object({
        measurement: z.string().min(1),
        fields: z.record(z.string().min(1)),
      }),
    )
    .min(1),
  stringFields: z.array(z.string().min(1)).default([]),
});

export function parseFieldMappings(input: unknown): FieldMappings {
  const parsed = mappingsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid field mappings: ${issues}`);
  }
  return parsed.data;
}

/**
 * Read and validate the mapping file (JSON).
 */
export function loadFieldMappings(filePath: string): FieldMappings {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read field mappings ${filePath}: ${describeError(error)}`,
      asError(error),
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Field mappings ${filePath} is not valid JSON: ${describeError(error)}`,
      asError(error),
    );
  }
  return parseFieldMappings(json);
}

/**
 * Raw names present in more than one table. Tables are expected to be
 * disjoint; when they are not, the first listed table wins.
 */
export function findOverlappingKeys(
  mappings: FieldMappings,
): Map<string, string[]> {
  const owners = new Map<string, string[]>();
  for (const table of mappings.tables) {
    for (const rawName of Object.keys(table.fields)) {
      const list = owners.get(rawName) ?? [];
      list.push(table.measurement);
      owners.set(rawName, list);
    }
  }
  for (const [rawName, list] of owners) {
    if (list.length < 2) owners.delete(rawName);
  }
  return owners;
}
