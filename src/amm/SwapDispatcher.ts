import { createLogger } from '../utils/logger.js';
import { AmmError } from './AmmError.js';
import { isU128 } from '../math/wide.js';
import type { TokenPairStore } from './TokenPairStore.js';
import type { TransferCoordinator } from './TransferCoordinator.js';
import type { AccountId, TransferOutcome } from '../types/index.js';
import type winston from 'winston';

/**
 * SwapDispatcher — the single inbound entry point.
 *
 * A token ledger (`predecessorId`) reports that `senderId` moved `amount` of
 * its token to the pool. The owner's transfers are liquidity deposits and
 * commit immediately; everyone else's are swaps handed to the
 * TransferCoordinator.
 *
 * Runs synchronously: a thrown AmmError means nothing was accepted and the
 * ledger refunds the sender in full.
 */
export class SwapDispatcher {
    constructor(
        private readonly store: TokenPairStore,
        private readonly coordinator: TransferCoordinator,
        private readonly logger: winston.Logger = createLogger('info', 'swap-dispatcher'),
    ) { }

    ftOnTransfer(predecessorId: AccountId, senderId: AccountId, amount: bigint, _msg: string): TransferOutcome {
        const slot = this.store.indexOf(predecessorId);
        if (slot === undefined) {
            throw new AmmError('UNSUPPORTED_TOKEN', `Token ${predecessorId} is not supported by this pool`);
        }
        if (amount <= 0n) {
            throw new AmmError('ZERO_AMOUNT', 'Transferred amount must be positive');
        }
        if (!isU128(amount)) {
            throw new AmmError('ARITHMETIC_OVERFLOW', `Transferred amount ${amount} exceeds 128 bits`);
        }

        if (senderId === this.store.owner) {
            const balance = this.store.creditDeposit(slot, amount);
            this.logger.info(`Owner deposit`, {
                token: predecessorId,
                amount: amount.toString(),
                balance: balance.toString(),
            });
            return { kind: 'value', refund: 0n };
        }

        const { swap, refund } = this.coordinator.initiateSwap(senderId, slot, amount);
        return { kind: 'pending', swapId: swap.id, refund };
    }
}
