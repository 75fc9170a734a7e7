/**
 * Helpers for reading schema nodes.
 */

import { JsonValue, SchemaObject, SchemaType } from './types';

/**
 * Declared types of a node as a sorted, de-duplicated list.
 */
export function typeSet(node: SchemaObject): SchemaType[] {
  if (node.type === undefined) return [];
  const types = Array.isArray(node.type) ? node.type : [node.type];
  return [...new Set(types)].sort();
}

export function sameTypes(a: SchemaObject, b: SchemaObject): boolean {
  const left = typeSet(a);
  const right = typeSet(b);
  return left.length === right.length && left.every((t, i) => t === right[i]);
}

export function hasType(node: SchemaObject, type: SchemaType): boolean {
  return typeSet(node).includes(type);
}

export function typeLabel(types: readonly SchemaType[]): string {
  return types.length === 0 ? '(none)' : types.join(' | ');
}

/**
 * JSON text of a value with object keys sorted, so equal literals compare equal.
 */
export function canonicalJson(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value);
}

/**
 * Own property lookup that ignores prototype keys such as 'constructor'.
 */
export function lookup<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(record, key) ? record[key] : undefined;
}
