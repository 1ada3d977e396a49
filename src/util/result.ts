/**
 * Result type returned by collaborators whose expected failures are values, not exceptions.
 */
export type Result<TData, TMeta = unknown> =
  | { ok: true; data: TData; meta?: TMeta }
  | { ok: false; error: string; meta?: TMeta };

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
