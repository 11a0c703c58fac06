export function assert<T>(
  predicate: T,
  errorMessage: string,
): asserts predicate {
  if (!predicate) {
    throw new Error(errorMessage);
  }
}

export function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

export function isPositiveInteger(value: unknown): value is number {
  return isNonNegativeInteger(value) && value > 0;
}
