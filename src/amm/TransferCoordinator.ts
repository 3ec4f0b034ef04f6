import { createLogger } from '../utils/logger.js';
import { newSwapId, nowMs } from '../utils/stamp.js';
import { AmmError } from './AmmError.js';
import { quote } from './PricingEngine.js';
import { otherSlot } from './TokenPairStore.js';
import type { TokenPairStore } from './TokenPairStore.js';
import { checkedAdd } from '../math/wide.js';
import { SwapStatus } from '../types/index.js';
import type { FungibleTokenClient } from '../token/FungibleTokenClient.js';
import type { AccountId, CallBudget, SlotIndex, SwapRecord } from '../types/index.js';
import type winston from 'winston';

export const DEFAULT_SWAP_HISTORY_LIMIT = 1000;

export interface PendingSwap {
    swap: SwapRecord;
    /** Settles with the refundable amount: 0 on commit, the input amount on rollback. */
    refund: Promise<bigint>;
}

/**
 * TransferCoordinator — two-phase swap execution.
 *
 * Phase 1 (initiateSwap) prices the swap against the current reserves and
 * issues the outbound transfer without touching the pool. Phase 2 (the
 * continuation) commits the precomputed balances only if the transfer went
 * through, otherwise reports the input as refundable.
 *
 * In-flight swaps do not reserve liquidity: each one is priced against the
 * reserves visible when it was initiated and its commit overwrites both
 * balances with the values computed then.
 *
 * Quoted records stay until they settle; beyond `historyLimit` settled
 * records, the oldest settled ones are dropped.
 */
export class TransferCoordinator {
    private readonly swaps = new Map<string, SwapRecord>();
    private readonly settled: string[] = [];

    constructor(
        private readonly store: TokenPairStore,
        private readonly client: FungibleTokenClient,
        private readonly budget: CallBudget,
        private readonly logger: winston.Logger = createLogger('info', 'transfer-coordinator'),
        private readonly historyLimit: number = DEFAULT_SWAP_HISTORY_LIMIT,
    ) { }

    initiateSwap(initiator: AccountId, inputSlot: SlotIndex, amount: bigint): PendingSwap {
        const outputSlot = otherSlot(inputSlot);
        const reserveIn = this.store.balanceAt(inputSlot);
        const reserveOut = this.store.balanceAt(outputSlot);
        const tokenIn = this.store.addressAt(inputSlot);
        const tokenOut = this.store.addressAt(outputSlot);

        const newBalanceIn = checkedAdd(reserveIn, amount);
        if (newBalanceIn === undefined) {
            throw new AmmError('ARITHMETIC_OVERFLOW', `Swap input would overflow the ${tokenIn} reserve`);
        }

        const amountOut = quote(reserveIn, reserveOut, amount);
        if (amountOut > reserveOut) {
            throw new AmmError(
                'INSUFFICIENT_LIQUIDITY',
                `Quoted ${amountOut} ${tokenOut} exceeds the reserve of ${reserveOut}`,
            );
        }
        if (amountOut === 0n) {
            throw new AmmError('ZERO_OUTPUT', `Swapping ${amount} ${tokenIn} yields 0 ${tokenOut}`);
        }

        const swap: SwapRecord = {
            id: newSwapId(),
            initiator,
            inputSlot,
            outputSlot,
            tokenIn,
            tokenOut,
            amountIn: amount,
            amountOut,
            newBalanceIn,
            newBalanceOut: reserveOut - amountOut,
            status: SwapStatus.QUOTED,
            createdAt: nowMs(),
        };
        this.swaps.set(swap.id, swap);

        this.logger.info(`Swap quoted`, {
            swapId: swap.id,
            initiator,
            tokenIn,
            amountIn: amount.toString(),
            tokenOut,
            amountOut: amountOut.toString(),
        });

        const refund = this.client
            .ftTransfer(tokenOut, { receiverId: initiator, amount: amountOut }, this.budget)
            .then(
                () => this.onTransferred(swap),
                (err: unknown) => this.onTransferFailed(swap, err),
            );

        return { swap: { ...swap }, refund };
    }

    getSwap(id: string): SwapRecord | undefined {
        const swap = this.swaps.get(id);
        return swap ? { ...swap } : undefined;
    }

    listSwaps(): SwapRecord[] {
        return [...this.swaps.values()].map((swap) => ({ ...swap }));
    }

    // ── Continuations ───────────────────────────────────────

    private onTransferred(swap: SwapRecord): bigint {
        this.store.commitSwap(swap.inputSlot, swap.newBalanceIn, swap.newBalanceOut);
        swap.status = SwapStatus.COMMITTED;
        swap.settledAt = nowMs();
        this.logger.info(`Swap committed`, {
            swapId: swap.id,
            balanceIn: swap.newBalanceIn.toString(),
            balanceOut: swap.newBalanceOut.toString(),
        });
        this.retire(swap.id);
        return 0n;
    }

    private onTransferFailed(swap: SwapRecord, err: unknown): bigint {
        swap.status = SwapStatus.ROLLED_BACK;
        swap.settledAt = nowMs();
        swap.failureReason = err instanceof Error ? err.message : String(err);
        this.logger.warn(`Transferring the swapped tokens failed, refunding input`, {
            swapId: swap.id,
            reason: swap.failureReason,
            refund: swap.amountIn.toString(),
        });
        this.retire(swap.id);
        return swap.amountIn;
    }

    private retire(id: string): void {
        this.settled.push(id);
        while (this.settled.length > this.historyLimit) {
            const oldest = this.settled.shift();
            if (oldest !== undefined) this.swaps.delete(oldest);
        }
    }
}
