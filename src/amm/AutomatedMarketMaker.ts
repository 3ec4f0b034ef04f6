import { createLogger } from '../utils/logger.js';
import { AmmError } from './AmmError.js';
import { MetadataResolver } from './MetadataResolver.js';
import { ratio } from './PricingEngine.js';
import { SwapDispatcher } from './SwapDispatcher.js';
import { TokenPairStore } from './TokenPairStore.js';
import { TransferCoordinator } from './TransferCoordinator.js';
import { DEFAULT_CALL_TIMEOUT_MS, ONE_YOCTO } from '../token/FungibleTokenClient.js';
import type { FungibleTokenClient } from '../token/FungibleTokenClient.js';
import type {
    AccountId,
    LogLevel,
    MetadataStatus,
    SwapRecord,
    TokenMetadata,
    TransferOutcome,
} from '../types/index.js';
import type winston from 'winston';

export interface AmmOptions {
    owner: AccountId;
    tokenA: AccountId;
    tokenB: AccountId;
    client: FungibleTokenClient;
    callTimeoutMs?: number;
    /** Settled swap records kept in memory. */
    swapHistoryLimit?: number;
    logLevel?: LogLevel;
}

/**
 * AutomatedMarketMaker — two-token constant-product pool.
 *
 * Composes the store, the metadata resolver, the transfer coordinator and
 * the dispatcher. Construction schedules metadata resolution for both tokens;
 * `ready()` settles once both answers (or failures) are in.
 */
export class AutomatedMarketMaker {
    private readonly initialMetadata: Promise<void>;

    private constructor(
        private readonly store: TokenPairStore,
        private readonly resolver: MetadataResolver,
        private readonly coordinator: TransferCoordinator,
        private readonly dispatcher: SwapDispatcher,
        private readonly logger: winston.Logger,
    ) {
        const [tokenA, tokenB] = store.tokens;
        this.initialMetadata = Promise.all([
            resolver.requestMetadata(tokenA),
            resolver.requestMetadata(tokenB),
        ]).then(() => undefined);
    }

    /**
     * Factory: wires up all components and starts metadata resolution.
     */
    static create(opts: AmmOptions): AutomatedMarketMaker {
        const level = opts.logLevel ?? 'info';
        const timeoutMs = opts.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;

        const store = new TokenPairStore(opts.owner, opts.tokenA, opts.tokenB);
        const resolver = new MetadataResolver(
            store,
            opts.client,
            { timeoutMs, attachedDeposit: 0n },
            createLogger(level, 'metadata-resolver'),
        );
        const coordinator = new TransferCoordinator(
            store,
            opts.client,
            { timeoutMs, attachedDeposit: ONE_YOCTO },
            createLogger(level, 'transfer-coordinator'),
            opts.swapHistoryLimit,
        );
        const dispatcher = new SwapDispatcher(store, coordinator, createLogger(level, 'swap-dispatcher'));
        const logger = createLogger(level, 'amm');

        logger.info(`Pool created`, { owner: opts.owner, tokenA: opts.tokenA, tokenB: opts.tokenB });
        return new AutomatedMarketMaker(store, resolver, coordinator, dispatcher, logger);
    }

    get owner(): AccountId {
        return this.store.owner;
    }

    get tokens(): [AccountId, AccountId] {
        return this.store.tokens;
    }

    /** Settles when the construction-time metadata queries have completed. */
    ready(): Promise<void> {
        return this.initialMetadata;
    }

    // ── Inbound ─────────────────────────────────────────────

    /**
     * Transfer notification from the ledger `predecessorId`.
     */
    ftOnTransfer(predecessorId: AccountId, senderId: AccountId, amount: bigint, msg: string): TransferOutcome {
        return this.dispatcher.ftOnTransfer(predecessorId, senderId, amount, msg);
    }

    // ── Queries ─────────────────────────────────────────────

    getBalance(token: AccountId): bigint {
        return this.store.getBalance(token);
    }

    getMetadata(token: AccountId): TokenMetadata {
        const status = this.resolver.getStatus(token);
        if (status.state === 'failed') {
            throw new AmmError(
                'METADATA_UNAVAILABLE',
                `Metadata for ${token} is unavailable: ${status.reason}`,
            );
        }
        return this.store.getMetadata(token);
    }

    getMetadataStatus(token: AccountId): MetadataStatus {
        return this.resolver.getStatus(token);
    }

    getRatio(): bigint {
        const [tokenA, tokenB] = this.store.tokens;
        const metadataA = this.getMetadata(tokenA);
        const metadataB = this.getMetadata(tokenB);
        return ratio(
            this.store.balanceAt(0),
            this.store.balanceAt(1),
            metadataA.decimals,
            metadataB.decimals,
        );
    }

    getSwap(id: string): SwapRecord | undefined {
        return this.coordinator.getSwap(id);
    }

    listSwaps(): SwapRecord[] {
        return this.coordinator.listSwaps();
    }

    // ── Administrative ──────────────────────────────────────

    /**
     * Re-queries a token's metadata. The new answer overwrites the old one.
     */
    requestMetadataRefresh(token: AccountId): Promise<MetadataStatus> {
        this.logger.info(`Metadata refresh requested`, { token });
        return this.resolver.requestMetadata(token);
    }
}
