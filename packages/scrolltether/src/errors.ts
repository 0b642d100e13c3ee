export class LinkedScrollError extends Error {
  override readonly name = "LinkedScrollError";

  constructor(message: string) {
    super(`scrolltether: ${message}`);
  }
}

/**
 * Fails fast on a broken caller contract. These are programming errors
 * (a disposed position being reused, fan-out without peers), never
 * recoverable states.
 */
export function invariant(
  condition: unknown,
  message: string,
): asserts condition {
  if (!condition) throw new LinkedScrollError(message);
}
