/** Human-readable text for any thrown value. */
export function describe_error(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

