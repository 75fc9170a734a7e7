/**
 * OpenAPI Schema Extraction
 *
 * Turns a parsed OpenAPI (or Swagger 2) document into the schema table the
 * matcher compares. Only the keywords the matcher understands are kept.
 */

import { JsonValue, SchemaNode, SchemaObject, SchemaTable, SchemaType } from '../core/types';

const SCHEMA_TYPES: readonly string[] = [
  'string',
  'number',
  'integer',
  'boolean',
  'object',
  'array',
  'null',
];

// ─── Guards ─────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSchemaType(value: unknown): value is SchemaType {
  return typeof value === 'string' && SCHEMA_TYPES.includes(value);
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return isRecord(value) && Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

// ─── Normalisation ──────────────────────────────────────────────────────────

/**
 * Normalise one raw schema. A `null` member of a type array becomes
 * `nullable: true`, so 3.0 and 3.1 spellings of the same schema compare equal.
 */
export function normalizeSchema(raw: unknown): SchemaNode {
  if (!isRecord(raw)) return {};
  if (typeof raw.$ref === 'string') return { $ref: raw.$ref };

  const node: SchemaObject = {};

  const declared: unknown[] = Array.isArray(raw.type) ? raw.type : [raw.type];
  const types = [...new Set(declared.filter(isSchemaType))];
  const withoutNull = types.filter((t) => t !== 'null');
  const nullInUnion = withoutNull.length > 0 && withoutNull.length < types.length;
  const kept = nullInUnion ? withoutNull : types;

  if (kept.length === 1) {
    node.type = kept[0];
  } else if (kept.length > 1) {
    node.type = kept;
  }

  if (isRecord(raw.properties)) {
    node.properties = Object.fromEntries(
      Object.entries(raw.properties).map(([name, prop]) => [name, normalizeSchema(prop)])
    );
  }

  if (Array.isArray(raw.required)) {
    node.required = raw.required.filter((r): r is string => typeof r === 'string');
  }

  if (Array.isArray(raw.enum)) {
    node.enum = raw.enum.filter(isJsonValue);
  }

  if (typeof raw.format === 'string') node.format = raw.format;
  if (typeof raw.description === 'string') node.description = raw.description;

  if (nullInUnion || raw.nullable === true || raw['x-nullable'] === true) {
    node.nullable = true;
  }

  if (isRecord(raw.items)) {
    node.items = normalizeSchema(raw.items);
  }

  return node;
}

/**
 * Named schemas of a document: `components.schemas` for OpenAPI 3,
 * `definitions` for Swagger 2. A document without either yields `{}`.
 */
export function extractSchemaTable(document: unknown): SchemaTable {
  if (!isRecord(document)) {
    throw new Error('Document is not an object');
  }

  const components = document.components;
  let schemas: Record<string, unknown> = {};
  if (isRecord(components) && isRecord(components.schemas)) {
    schemas = components.schemas;
  } else if (isRecord(document.definitions)) {
    schemas = document.definitions;
  }

  return Object.fromEntries(
    Object.entries(schemas).map(([name, schema]) => [name, normalizeSchema(schema)])
  );
}
