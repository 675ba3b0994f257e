/**
 * Storage value codec
 *
 * Nested records, sequences and timestamps are written to text columns as a
 * marker followed by a JSON tree of tagged nodes:
 *
 *   #sbv1#{"t":"r","v":[["name",{"t":"s","v":"Widget"}],["tags",{"t":"a","v":[{"t":"s","v":"a"}]}]]}
 *
 * A stored string is decoded only when it carries the exact marker and a
 * payload that validates as a node tree. Plain strings that happen to start
 * with the marker are encoded on write, so every marker-prefixed cell was
 * produced by `encodeValue`.
 */

import { z } from 'zod';
import { ConnectorError } from '../errors/index.js';
import type { DataRecord, SqlParam, StoredRow, Value } from '../types/index.js';
import { setField, toValue } from '../types/index.js';
import { formatTimestamp } from '../utils/timestamps.js';

export const ENCODING_MARKER = '#sbv1#';

type EncodedNode =
  | { t: 'z' }
  | { t: 'b'; v: boolean }
  | { t: 'i'; v: number }
  | { t: 'n'; v: number | string }
  | { t: 's'; v: string }
  | { t: 'd'; v: string }
  | { t: 'a'; v: EncodedNode[] }
  | { t: 'r'; v: [string, EncodedNode][] };

const encodedNodeSchema: z.ZodType<EncodedNode> = z.lazy(() =>
  z.union([
    z.object({ t: z.literal('z') }).strict(),
    z.object({ t: z.literal('b'), v: z.boolean() }).strict(),
    z.object({ t: z.literal('i'), v: z.number().int() }).strict(),
    z
      .object({
        t: z.literal('n'),
        v: z.union([z.number(), z.enum(['NaN', 'Infinity', '-Infinity', '-0'])]),
      })
      .strict(),
    z.object({ t: z.literal('s'), v: z.string() }).strict(),
    z.object({ t: z.literal('d'), v: z.string().min(1) }).strict(),
    z.object({ t: z.literal('a'), v: z.array(encodedNodeSchema) }).strict(),
    z.object({ t: z.literal('r'), v: z.array(z.tuple([z.string(), encodedNodeSchema])) }).strict(),
  ])
);

function toNode(value: Value): EncodedNode {
  if (value === null) return { t: 'z' };
  if (typeof value === 'boolean') return { t: 'b', v: value };
  if (typeof value === 'string') return { t: 's', v: value };
  if (typeof value === 'number') {
    if (Object.is(value, -0)) return { t: 'n', v: '-0' };
    if (!Number.isFinite(value)) return { t: 'n', v: String(value) };
    return Number.isInteger(value) ? { t: 'i', v: value } : { t: 'n', v: value };
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? { t: 'z' } : { t: 'd', v: value.toISOString() };
  }
  if (Array.isArray(value)) return { t: 'a', v: value.map(toNode) };
  return {
    t: 'r',
    v: Object.entries(value).map(([key, entry]): [string, EncodedNode] => [key, toNode(entry)]),
  };
}

function fromNode(node: EncodedNode): Value {
  switch (node.t) {
    case 'z':
      return null;
    case 'b':
    case 'i':
    case 's':
      return node.v;
    case 'n':
      return typeof node.v === 'number' ? node.v : Number(node.v);
    case 'd':
      return new Date(node.v);
    case 'a':
      return node.v.map(fromNode);
    case 'r': {
      const record: DataRecord = {};
      for (const [key, entry] of node.v) {
        setField(record, key, fromNode(entry));
      }
      return record;
    }
  }
}

function parsePayload(text: string): EncodedNode | undefined {
  if (!text.startsWith(ENCODING_MARKER)) return undefined;

  let raw: unknown;
  try {
    raw = JSON.parse(text.slice(ENCODING_MARKER.length));
  } catch {
    return undefined;
  }

  const result = encodedNodeSchema.safeParse(raw);
  return result.success ? result.data : undefined;
}

/**
 * Encode any value as marker-prefixed text
 */
export function encodeValue(value: Value): string {
  return `${ENCODING_MARKER}${JSON.stringify(toNode(value))}`;
}

/**
 * Whether a string was produced by `encodeValue`
 */
export function isEncodedValue(text: string): boolean {
  return parsePayload(text) !== undefined;
}

/**
 * Decode text produced by `encodeValue`
 * @throws ConnectorError (DECODE_FAILED) when the text is not an encoded value
 */
export function decodeValue(text: string): Value {
  const node = parsePayload(text);
  if (node === undefined) {
    throw new ConnectorError({
      code: 'DECODE_FAILED',
      message: 'Value is not an encoded storage value',
      context: { preview: text.slice(0, 32) },
    });
  }
  return fromNode(node);
}

/**
 * Decode a string if it is an encoded value, otherwise return it unchanged
 */
export function decodeIfEncoded(text: string): Value {
  const node = parsePayload(text);
  return node === undefined ? text : fromNode(node);
}

/**
 * Convert one field value into a bound statement parameter
 */
export function toStorageParam(value: Value): SqlParam {
  if (value === null || typeof value === 'boolean' || typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string') {
    return value.startsWith(ENCODING_MARKER) ? encodeValue(value) : value;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : formatTimestamp(value);
  }
  return encodeValue(value);
}

/**
 * Encode a record's fields for writing: composites are encoded, timestamps
 * rendered as `YYYY-MM-DD HH:MM:SS`, scalars passed through
 */
export function prepareForStorage(record: DataRecord): Record<string, SqlParam> {
  const prepared: Record<string, SqlParam> = {};
  for (const [field, value] of Object.entries(record)) {
    setField(prepared, field, toStorageParam(value));
  }
  return prepared;
}

/**
 * Decode a row read back from storage
 */
export function restoreFromStorage(row: StoredRow): DataRecord {
  const restored: DataRecord = {};
  for (const [column, cell] of Object.entries(row)) {
    const value = toValue(cell);
    setField(restored, column, typeof value === 'string' ? decodeIfEncoded(value) : value);
  }
  return restored;
}
