/**
 * JSON Document Parser
 */

import { parseError } from './errors';

const TRAILING_COMMA = /,(\s*[\]}])/g;

function stripBom(input: string): string {
  return input.charCodeAt(0) === 0xfeff ? input.slice(1) : input;
}

/**
 * Parse a JSON document. A leading BOM is ignored, and a document that only
 * fails because of trailing commas is parsed without them.
 *
 * @param source Label used in error messages, usually the file path
 */
export function parseJson(input: string, source?: string): unknown {
  const text = stripBom(input).trim();

  try {
    return JSON.parse(text);
  } catch (error) {
    const relaxed = text.replace(TRAILING_COMMA, '$1');
    if (relaxed === text) throw parseError('JSON', error, source);

    try {
      return JSON.parse(relaxed);
    } catch {
      throw parseError('JSON', error, source);
    }
  }
}

/**
 * Whether the text is shaped like a JSON object or array.
 */
export function isJson(input: string): boolean {
  return /^(\{[\s\S]*\}|\[[\s\S]*\])$/.test(stripBom(input).trim());
}
