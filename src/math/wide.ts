/**
 * Fixed-width unsigned arithmetic on bigint.
 *
 * Balances live in the unsigned 128-bit range. The one product the pool
 * computes (reserve × amount) is evaluated in the 256-bit range and narrowed
 * back after dividing.
 */

export const U128_MAX = (1n << 128n) - 1n;
export const U256_MAX = (1n << 256n) - 1n;

export function isU128(value: bigint): boolean {
    return value >= 0n && value <= U128_MAX;
}

/**
 * Narrows a 256-bit intermediate back to 128 bits. Throws RangeError when the
 * value does not fit.
 */
export function narrowU128(value: bigint): bigint {
    if (!isU128(value)) {
        throw new RangeError(`Value ${value} does not fit in 128 bits`);
    }
    return value;
}

/**
 * floor(a * b / divisor) with the product taken in 256 bits.
 */
export function mulDiv(a: bigint, b: bigint, divisor: bigint): bigint {
    if (!isU128(a) || !isU128(b)) {
        throw new RangeError('mulDiv operands must be unsigned 128-bit values');
    }
    if (divisor <= 0n) {
        throw new RangeError('mulDiv divisor must be positive');
    }
    // 128 × 128 bits, always within U256_MAX
    const product = a * b;
    return narrowU128(product / divisor);
}

/** Sum of two 128-bit values, or undefined when it leaves the range. */
export function checkedAdd(a: bigint, b: bigint): bigint | undefined {
    const sum = a + b;
    return isU128(a) && isU128(b) && isU128(sum) ? sum : undefined;
}

/** Product of two 128-bit values, or undefined when it leaves the range. */
export function checkedMul(a: bigint, b: bigint): bigint | undefined {
    const product = a * b;
    return isU128(a) && isU128(b) && isU128(product) ? product : undefined;
}
