/**
 * PricingEngine — fee-less constant-product pricing.
 *
 * Pure functions over raw reserves; no state, no outbound calls.
 */
import { AmmError } from './AmmError.js';
import { checkedMul, mulDiv } from '../math/wide.js';

/**
 * Output amount for swapping `amountIn` into a pool with the given reserves:
 * floor(balanceOut * amountIn / (balanceIn + amountIn)).
 *
 * Never exceeds `balanceOut`. The caller is responsible for rejecting a zero
 * result or one above the reserve.
 */
export function quote(balanceIn: bigint, balanceOut: bigint, amountIn: bigint): bigint {
    const denominator = balanceIn + amountIn;
    if (denominator === 0n) return 0n;
    return mulDiv(balanceOut, amountIn, denominator);
}

/**
 * Decimals-normalized constant product: whole units of token 0 times whole
 * units of token 1. Observation only; it does not gate swaps.
 */
export function ratio(
    balance0: bigint,
    balance1: bigint,
    decimals0: number,
    decimals1: number,
): bigint {
    const units0 = balance0 / 10n ** BigInt(decimals0);
    const units1 = balance1 / 10n ** BigInt(decimals1);
    const product = checkedMul(units0, units1);
    if (product === undefined) {
        throw new AmmError('ARITHMETIC_OVERFLOW', `Ratio ${units0} × ${units1} exceeds 128 bits`);
    }
    return product;
}
