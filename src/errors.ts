/**
 * Detail string for a caught value: the message of an Error, otherwise its
 * string form.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
