/**
 * Line protocol serialization for the time-series store.
 *
 *   measurement[,tag=value...] field1=v1,field2=v2 <unix-seconds>
 */

export interface Point {
  measurement: string;
  /** Non-empty, in emission order */
  fields: ReadonlyArray<readonly [string, number]>;
  /** UTC epoch seconds */
  timestamp: number;
}

export interface LineKey {
  measurement: string;
  tags: Record<string, string>;
  timestamp: number;
}

const UNESCAPED_SPACE = /(?<!\\) /;
const UNESCAPED_COMMA = /(?<!\\),/;
const UNESCAPED_EQUALS = /(?<!\\)=/;

export function escapeMeasurement(name: string): string {
  return name.replace(/[, ]/g, '\\$&');
}

export function escapeKey(name: string): string {
  return name.replace(/[,= ]/g, '\\$&');
}

function unescape(value: string): string {
  return value.replace(/\\([,= ])/g, '$1');
}

/**
 * Floats are written without a type suffix; integers-valued floats print
 * without a fraction, which the store still reads as float.
 */
export function formatFloat(value: number): string {
  return String(value);
}

export function serializePoint(point: Point): string {
  const fields = point.fields
    .map(([key, value]) => `${escapeKey(key)}=${formatFloat(value)}`)
    .join(',');
  return `${escapeMeasurement(point.measurement)} ${fields} ${point.timestamp}`;
}

/**
 * A serialized point read back: its identity plus the field values.
 */
export interface ParsedLine extends LineKey {
  fields: Array<[string, number]>;
}

function splitPair(pair: string): [string, string] | null {
  const at = pair.search(UNESCAPED_EQUALS);
  if (at <= 0) return null;
  return [unescape(pair.slice(0, at)), pair.slice(at + 1)];
}

/**
 * Read a serialized point back (measurement, tags, fields, timestamp).
 * Returns null for blank or malformed lines and for non-numeric fields.
 */
export function parseLine(line: string): ParsedLine | null {
  const trimmed = line.trim();
  if (trimmed === '') return null;

  const [head] = trimmed.split(UNESCAPED_SPACE, 1);
  const lastSpace = trimmed.lastIndexOf(' ');
  if (lastSpace <= head.length) return null;

  const timestampText = trimmed.slice(lastSpace + 1);
  if (!/^-?\d+$/.test(timestampText)) return null;

  const [measurement, ...tagPairs] = head.split(UNESCAPED_COMMA);
  const tags: Record<string, string> = {};
  for (const pair of tagPairs) {
    const tag = splitPair(pair);
    if (!tag) return null;
    tags[tag[0]] = unescape(tag[1]);
  }

  const fields: Array<[string, number]> = [];
  for (const pair of trimmed.slice(head.length + 1, lastSpace).split(UNESCAPED_COMMA)) {
    const field = splitPair(pair);
    if (!field || field[1].trim() === '') return null;
    const value = Number(field[1]);
    if (!Number.isFinite(value)) return null;
    fields.push([field[0], value]);
  }

  return {
    measurement: unescape(measurement),
    tags,
    fields,
    timestamp: Number(timestampText),
  };
}
