// ── Outcome ─────────────────────────────────────────────────
// Best-effort calls report failure as a value; callers decide
// whether to log it and move on.

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

export async function attempt<T>(fn: () => Promise<T>): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (err) {
    return { ok: false, error: describeError(err) };
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
