/**
 * Fold operators
 *
 * A fold merges one accepted peer value into the running aggregate.
 * The seed is the aggregate's value at the start of every epoch and
 * must be the operator's neutral element.
 */

export interface FoldOperator {
  name: string;
  seed: number;
  combine: (aggregate: number, value: number) => number;
}

export type FoldOperatorName = 'multiplicative' | 'additive';

export const FOLD_OPERATORS: Readonly<Record<FoldOperatorName, FoldOperator>> =
  Object.freeze({
    multiplicative: {
      name: 'multiplicative',
      seed: 1,
      combine: (aggregate: number, value: number) => aggregate * value,
    },
    additive: {
      name: 'additive',
      seed: 0,
      combine: (aggregate: number, value: number) => aggregate + value,
    },
  });

export const DEFAULT_FOLD_OPERATOR: FoldOperatorName = 'multiplicative';

export function resolveFoldOperator(
  fold: FoldOperator | FoldOperatorName = DEFAULT_FOLD_OPERATOR,
): FoldOperator {
  return typeof fold === 'string' ? FOLD_OPERATORS[fold] : fold;
}

/**
 * Round to `digits` decimal places on the exact binary value, sending exact
 * ties to the even digit. Non-finite values pass through unchanged.
 */
export function roundTo(value: number, digits = 3): number {
  if (!Number.isFinite(value)) {
    return value;
  }

  // A tie at `digits` decimals is an odd multiple of 2^-(digits + 1)
  const halves = value * 2 ** (digits + 1);
  if (Number.isInteger(halves) && halves % 2 !== 0) {
    const lower = Math.floor(value * 10 ** digits);
    const even = lower % 2 === 0 ? lower : lower + 1;
    return even / 10 ** digits;
  }

  // toFixed rounds the exact value; only ties go up, and those are handled above
  return Number(value.toFixed(digits));
}
