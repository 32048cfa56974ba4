/**
 * Error kinds raised by the parser and the structure pricer.
 */

/** Any failure to turn broker shorthand into a ParsedOrder */
export class InvalidOrderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidOrderError";
  }
}

/** Structure legs and supplied market data disagree in length */
export class LegCountMismatchError extends Error {
  constructor(
    public readonly legCount: number,
    public readonly marketCount: number
  ) {
    super(`Leg count mismatch: ${legCount} legs but ${marketCount} market entries`);
    this.name = "LegCountMismatchError";
  }
}
