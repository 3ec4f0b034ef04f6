// ── Identity ────────────────────────────────────────────────
/** Account or contract identifier on the token ledger. */
export type AccountId = string;

/** Index of one of the pool's two token slots. */
export type SlotIndex = 0 | 1;

// ── Token metadata ──────────────────────────────────────────
export interface TokenMetadata {
    name: string;
    symbol: string;
    decimals: number;
}

/** Full `ft_metadata` response as returned by a token ledger. */
export interface FungibleTokenMetadata extends TokenMetadata {
    spec: string;
    icon?: string | null;
    reference?: string | null;
    reference_hash?: string | null;
}

export type MetadataStatus =
    | { state: 'pending' }
    | { state: 'resolved'; metadata: TokenMetadata }
    | { state: 'failed'; reason: string };

// ── Outbound calls ──────────────────────────────────────────
/**
 * Resource budget attached to every outbound call.
 * Running out of time is reported to the continuation as an ordinary failure.
 */
export interface CallBudget {
    timeoutMs: number;
    attachedDeposit: bigint;
}

export interface TransferArgs {
    receiverId: AccountId;
    amount: bigint;
    memo?: string;
}

// ── Swaps ───────────────────────────────────────────────────
export enum SwapStatus {
    QUOTED = 'QUOTED',
    COMMITTED = 'COMMITTED',
    ROLLED_BACK = 'ROLLED_BACK',
}

export interface SwapRecord {
    id: string;
    initiator: AccountId;
    inputSlot: SlotIndex;
    outputSlot: SlotIndex;
    tokenIn: AccountId;
    tokenOut: AccountId;
    amountIn: bigint;
    amountOut: bigint;
    newBalanceIn: bigint;
    newBalanceOut: bigint;
    status: SwapStatus;
    createdAt: number;
    settledAt?: number;
    failureReason?: string;
}

/**
 * Result of an inbound transfer notification.
 * `value` is final; `pending` settles once the outbound transfer has answered.
 */
export type TransferOutcome =
    | { kind: 'value'; refund: bigint }
    | { kind: 'pending'; swapId: string; refund: Promise<bigint> };

// ── Config ──────────────────────────────────────────────────
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface AmmConfig {
    owner: AccountId;
    tokenA: AccountId;
    tokenB: AccountId;
    ledgerHost: string;
    ledgerPort: number;
    apiPort: number;
    callTimeoutMs: number;
    /** Settled swap records kept for `listSwaps`. */
    swapHistoryLimit: number;
    logLevel: LogLevel;
}
