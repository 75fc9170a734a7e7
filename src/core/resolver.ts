/**
 * Reference Resolver
 *
 * Turns `$ref` pointers into the schema objects they designate inside one
 * schema table. Only internal pointers to named schemas are followed.
 */

import { SchemaNode, SchemaObject, SchemaTable, isReference } from './types';
import { lookup } from './schema';

// ─── Types ──────────────────────────────────────────────────────────────────

export type Resolution =
  | {
      status: 'resolved';
      /** Name of the last schema followed, if any reference was followed */
      name?: string;
      node: SchemaObject;
      /** Input set plus every schema name followed */
      visited: ReadonlySet<string>;
    }
  | { status: 'unresolved'; pointer: string }
  | { status: 'cycle'; name: string };

const POINTER_PREFIXES = ['#/components/schemas/', '#/definitions/'];

// ─── Pointers ───────────────────────────────────────────────────────────────

/**
 * Extract the schema name from an internal pointer.
 * Returns undefined for external or non-schema pointers.
 */
export function parsePointer(pointer: string): string | undefined {
  const prefix = POINTER_PREFIXES.find((p) => pointer.startsWith(p));
  if (!prefix) return undefined;

  const token = pointer.slice(prefix.length);
  // Deeper pointers (e.g. into a schema's properties) are not named schemas
  if (token === '' || token.includes('/')) return undefined;

  let decoded: string;
  try {
    decoded = decodeURIComponent(token);
  } catch {
    decoded = token;
  }
  return decoded.replace(/~1/g, '/').replace(/~0/g, '~');
}

// ─── Resolution ─────────────────────────────────────────────────────────────

/**
 * Resolve a pointer against a table.
 *
 * `visited` holds the schema names already on the current comparison path;
 * meeting one of them again reports a cycle instead of resolving.
 */
export function resolveReference(
  pointer: string,
  table: SchemaTable,
  visited: ReadonlySet<string> = new Set()
): Resolution {
  return resolveSchema({ $ref: pointer }, table, visited);
}

/**
 * Resolve a node that may or may not be a reference. Reference chains
 * (a named schema that is itself a reference) are followed to the end.
 */
export function resolveSchema(
  node: SchemaNode,
  table: SchemaTable,
  visited: ReadonlySet<string> = new Set()
): Resolution {
  let current = node;
  let seen = visited;
  let name: string | undefined;

  while (isReference(current)) {
    const target = parsePointer(current.$ref);
    if (target === undefined) {
      return { status: 'unresolved', pointer: current.$ref };
    }
    if (seen.has(target)) {
      return { status: 'cycle', name: target };
    }

    const next = lookup(table, target);
    if (next === undefined) {
      return { status: 'unresolved', pointer: current.$ref };
    }

    seen = new Set([...seen, target]);
    name = target;
    current = next;
  }

  return { status: 'resolved', name, node: current, visited: seen };
}
