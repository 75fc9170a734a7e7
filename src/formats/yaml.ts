/**
 * YAML Document Parser
 */

import YAML from 'yaml';
import { parseError } from './errors';

/**
 * Parse a single YAML document.
 *
 * @param source Label used in error messages, usually the file path
 */
export function parseYaml(input: string, source?: string): unknown {
  try {
    return YAML.parse(input);
  } catch (error) {
    throw parseError('YAML', error, source);
  }
}
