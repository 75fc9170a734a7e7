/**
 * Document Formats — Barrel export
 */

export { parseJson, isJson } from './json';
export { parseYaml } from './yaml';
export { extractSchemaTable, normalizeSchema } from './openapi';

import * as fs from 'fs';
import * as path from 'path';
import { isJson, parseJson } from './json';
import { parseYaml } from './yaml';

/**
 * Auto-detect format and parse a document. Anything that does not look like
 * JSON is read as YAML.
 */
export function autoParse(input: string, source?: string): unknown {
  if (isJson(input)) {
    return parseJson(input, source);
  }
  return parseYaml(input, source);
}

/**
 * Read and parse a document file, choosing the parser by extension.
 */
export async function readDocument(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new Error(
      `Unable to read document "${filePath}": ${error instanceof Error ? error.message : String(error)}`
    );
  }

  switch (path.extname(filePath).toLowerCase()) {
    case '.json':
      return parseJson(content, filePath);
    case '.yaml':
    case '.yml':
      return parseYaml(content, filePath);
    default:
      return autoParse(content, filePath);
  }
}
