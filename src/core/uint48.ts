/** 2^48 - 1. Still a safe integer, so uint48 values travel as plain numbers. */
export const MAX_UINT48 = 0xffff_ffff_ffff;

export function isUint48(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0 && value <= MAX_UINT48;
}

/**
 * Add two uint48 values. Returns null when the sum no longer fits,
 * so callers pick the error that fits their context.
 */
export function addUint48(a: number, b: number): number | null {
  const sum = a + b;
  return isUint48(sum) ? sum : null;
}
