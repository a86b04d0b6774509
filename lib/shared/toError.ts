/**
 * Convert any thrown value into a *real* `Error`.
 *
 * ‣ Works for primitives, plain objects, cross-realm errors, etc.
 * ‣ Copies `message` and `stack` when they are available.
 */
export function toError(err: unknown): Error {
  if (err instanceof Error) return err;

  const message =
    err && typeof err === "object" && "message" in err
      ? String(err.message)
      : String(err);

  const error = new Error(message);

  if (
    err &&
    typeof err === "object" &&
    "stack" in err &&
    typeof err.stack === "string"
  ) {
    error.stack = err.stack;
  }

  return error;
}
