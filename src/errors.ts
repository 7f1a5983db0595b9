// ============================================================================
// Shared Error Helpers
// ============================================================================

/** Message of an Error, or the thrown value as a string */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
