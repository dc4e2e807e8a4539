const DIGITS = /^\d+$/;

export type Comparator<T> = (a: T, b: T) => number;

/**
 * Order two sequence numbers.
 *
 * Kinesis sequence numbers are decimal integers of varying width, so plain
 * string comparison gets `"99" > "100"` wrong. Digit strings compare as
 * BigInt; anything else (sentinels like `TRIM_HORIZON`) falls back to
 * code-unit order.
 */
export function compareSequenceNumbers(a: string, b: string): number {
  if (DIGITS.test(a) && DIGITS.test(b)) {
    const x = BigInt(a);
    const y = BigInt(b);
    return x < y ? -1 : x > y ? 1 : 0;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

export type SequencePosition = {
  sequenceNumber: string;
  subSequenceNumber: number;
};

/** Sequence number first, then sub-sequence number (aggregated records). */
export const compareSequencePositions: Comparator<SequencePosition> = (a, b) =>
  compareSequenceNumbers(a.sequenceNumber, b.sequenceNumber) ||
  a.subSequenceNumber - b.subSequenceNumber;

/** Greatest element by `compare`; the first one wins ties. */
export function maxBy<T>(items: readonly T[], compare: Comparator<T>): T | undefined {
  let best: T | undefined;
  for (const item of items) {
    if (best === undefined || compare(item, best) > 0) best = item;
  }
  return best;
}
