/**
 * Parse failures, labelled with the document they came from when known.
 */
export function parseError(format: string, cause: unknown, source?: string): Error {
  const where = source ? ` in "${source}"` : '';
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new Error(`Failed to parse ${format}${where}: ${reason}`);
}
