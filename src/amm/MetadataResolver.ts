import { createLogger } from '../utils/logger.js';
import type { TokenPairStore } from './TokenPairStore.js';
import type { FungibleTokenClient } from '../token/FungibleTokenClient.js';
import type {
    AccountId,
    CallBudget,
    FungibleTokenMetadata,
    MetadataStatus,
    SlotIndex,
    TokenMetadata,
} from '../types/index.js';
import type winston from 'winston';

/**
 * MetadataResolver — asks a token ledger for its metadata and writes the
 * answer into the matching slot once the call completes.
 *
 * A failed query leaves the slot's metadata unset. The reason is kept so that
 * status queries and METADATA_UNAVAILABLE errors can report it; a later
 * refresh may still succeed.
 */
export class MetadataResolver {
    private readonly failures = new Map<SlotIndex, string>();

    constructor(
        private readonly store: TokenPairStore,
        private readonly client: FungibleTokenClient,
        private readonly budget: CallBudget,
        private readonly logger: winston.Logger = createLogger('info', 'metadata-resolver'),
    ) { }

    /**
     * Issues the metadata query. Throws UNKNOWN_TOKEN synchronously for an
     * address outside the pair; otherwise the returned promise settles after
     * the continuation ran and never rejects.
     */
    requestMetadata(address: AccountId): Promise<MetadataStatus> {
        const index = this.store.requireIndex(address);
        this.logger.debug(`Requesting metadata`, { token: address });

        return this.client.ftMetadata(address, this.budget).then(
            (response) => this.onResolved(index, response),
            (err: unknown) => this.onFailed(index, err),
        );
    }

    getStatus(address: AccountId): MetadataStatus {
        const index = this.store.requireIndex(address);
        const metadata = this.store.metadataAt(index);
        if (metadata) return { state: 'resolved', metadata };
        const reason = this.failures.get(index);
        return reason === undefined ? { state: 'pending' } : { state: 'failed', reason };
    }

    // ── Continuations ───────────────────────────────────────

    private onResolved(index: SlotIndex, response: FungibleTokenMetadata): MetadataStatus {
        const { name, symbol, decimals } = response;
        if (!Number.isInteger(decimals) || decimals < 0 || decimals > 255) {
            return this.onFailed(index, new Error(`Invalid decimals ${decimals}`));
        }
        const metadata: TokenMetadata = { name, symbol, decimals };
        this.store.setMetadata(index, metadata);
        this.failures.delete(index);
        this.logger.info(`Metadata resolved`, { token: this.store.addressAt(index), symbol, decimals });
        return { state: 'resolved', metadata };
    }

    private onFailed(index: SlotIndex, err: unknown): MetadataStatus {
        const reason = err instanceof Error ? err.message : String(err);
        this.failures.set(index, reason);
        this.logger.warn(`Metadata query failed`, { token: this.store.addressAt(index), reason });
        const metadata = this.store.metadataAt(index);
        return metadata ? { state: 'resolved', metadata } : { state: 'failed', reason };
    }
}
