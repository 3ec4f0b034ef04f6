import { AmmError } from './AmmError.js';
import { checkedAdd, isU128 } from '../math/wide.js';
import type { AccountId, SlotIndex, TokenMetadata } from '../types/index.js';

interface TokenSlot {
    readonly address: AccountId;
    balance: bigint;
    metadata?: TokenMetadata;
}

/**
 * TokenPairStore — the pool's system of record.
 *
 * Holds exactly two token slots and the owner identity. Reads are open to
 * everyone; the three mutators below each have a single caller:
 *   - creditDeposit  ← SwapDispatcher (owner deposit)
 *   - commitSwap     ← TransferCoordinator (successful transfer continuation)
 *   - setMetadata    ← MetadataResolver (metadata continuation)
 */
export class TokenPairStore {
    private readonly slots: [TokenSlot, TokenSlot];

    constructor(
        public readonly owner: AccountId,
        tokenA: AccountId,
        tokenB: AccountId,
    ) {
        if (tokenA === tokenB) {
            throw new Error(`Pool tokens must be distinct, got ${tokenA} twice`);
        }
        this.slots = [
            { address: tokenA, balance: 0n },
            { address: tokenB, balance: 0n },
        ];
    }

    /** Both token addresses, slot 0 first. */
    get tokens(): [AccountId, AccountId] {
        return [this.slots[0].address, this.slots[1].address];
    }

    /**
     * Slot index for an address, or undefined if it is not one of the pair.
     */
    indexOf(address: AccountId): SlotIndex | undefined {
        if (address === this.slots[0].address) return 0;
        if (address === this.slots[1].address) return 1;
        return undefined;
    }

    /**
     * Slot index for an address. Throws UNKNOWN_TOKEN otherwise.
     */
    requireIndex(address: AccountId): SlotIndex {
        const index = this.indexOf(address);
        if (index === undefined) {
            throw new AmmError('UNKNOWN_TOKEN', `Token ${address} is not part of this pool`);
        }
        return index;
    }

    addressAt(index: SlotIndex): AccountId {
        return this.slots[index].address;
    }

    balanceAt(index: SlotIndex): bigint {
        return this.slots[index].balance;
    }

    metadataAt(index: SlotIndex): TokenMetadata | undefined {
        const metadata = this.slots[index].metadata;
        return metadata ? { ...metadata } : undefined;
    }

    getBalance(address: AccountId): bigint {
        return this.balanceAt(this.requireIndex(address));
    }

    getMetadata(address: AccountId): TokenMetadata {
        const metadata = this.metadataAt(this.requireIndex(address));
        if (!metadata) {
            throw new AmmError('METADATA_UNAVAILABLE', `Metadata for ${address} has not been resolved yet`);
        }
        return metadata;
    }

    // ── Internal mutators ───────────────────────────────────

    /** @internal */
    creditDeposit(index: SlotIndex, amount: bigint): bigint {
        const slot = this.slots[index];
        const next = checkedAdd(slot.balance, amount);
        if (next === undefined) {
            throw new AmmError(
                'ARITHMETIC_OVERFLOW',
                `Deposit of ${amount} would overflow the ${slot.address} reserve`,
            );
        }
        slot.balance = next;
        return next;
    }

    /** @internal */
    commitSwap(inputSlot: SlotIndex, newBalanceIn: bigint, newBalanceOut: bigint): void {
        if (!isU128(newBalanceIn) || !isU128(newBalanceOut)) {
            throw new RangeError('Committed balances must be unsigned 128-bit values');
        }
        this.slots[inputSlot].balance = newBalanceIn;
        this.slots[otherSlot(inputSlot)].balance = newBalanceOut;
    }

    /** @internal */
    setMetadata(index: SlotIndex, metadata: TokenMetadata): void {
        this.slots[index].metadata = { ...metadata };
    }
}

export function otherSlot(index: SlotIndex): SlotIndex {
    return index === 0 ? 1 : 0;
}
