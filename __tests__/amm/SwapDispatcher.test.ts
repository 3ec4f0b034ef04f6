import { jest } from '@jest/globals';
import { SwapDispatcher } from '../../src/amm/SwapDispatcher.js';
import { TokenPairStore } from '../../src/amm/TokenPairStore.js';
import { TransferCoordinator } from '../../src/amm/TransferCoordinator.js';
import { U128_MAX } from '../../src/math/wide.js';
import { createLogger } from '../../src/utils/logger.js';
import type { FungibleTokenClient } from '../../src/token/FungibleTokenClient.js';
import { captureError } from '../helpers/errors.js';

const OWNER = 'owner.test';
const TOKEN_A = 'token-a.test';
const TOKEN_B = 'token-b.test';

function setup() {
    const store = new TokenPairStore(OWNER, TOKEN_A, TOKEN_B);
    const client = {
        ftMetadata: jest.fn<FungibleTokenClient['ftMetadata']>(),
        ftTransfer: jest.fn<FungibleTokenClient['ftTransfer']>(),
    };
    const logger = createLogger('error', 'test');
    const coordinator = new TransferCoordinator(store, client, { timeoutMs: 1000, attachedDeposit: 1n }, logger);
    const dispatcher = new SwapDispatcher(store, coordinator, logger);
    return { store, client, coordinator, dispatcher };
}

describe('SwapDispatcher', () => {
    test('owner transfers are deposits committed immediately', () => {
        const { store, client, dispatcher } = setup();

        const outcome = dispatcher.ftOnTransfer(TOKEN_A, OWNER, 1_000_000_000n, '');

        expect(outcome).toEqual({ kind: 'value', refund: 0n });
        expect(store.getBalance(TOKEN_A)).toBe(1_000_000_000n);
        expect(store.getBalance(TOKEN_B)).toBe(0n);
        expect(client.ftTransfer).not.toHaveBeenCalled();
    });

    test('repeated deposits accumulate on the right slot', () => {
        const { store, dispatcher } = setup();

        dispatcher.ftOnTransfer(TOKEN_B, OWNER, 1_000_000_000_000_000_000n, '');
        dispatcher.ftOnTransfer(TOKEN_B, OWNER, 1_000_000_000_000_000_000n, '');

        expect(store.getBalance(TOKEN_B)).toBe(2_000_000_000_000_000_000n);
        expect(store.getBalance(TOKEN_A)).toBe(0n);
    });

    test('other senders start a swap and get a pending outcome', async () => {
        const { store, client, coordinator, dispatcher } = setup();
        dispatcher.ftOnTransfer(TOKEN_A, OWNER, 2_000_000_000n, '');
        dispatcher.ftOnTransfer(TOKEN_B, OWNER, 1_000_000_000_000_000_000n, '');
        client.ftTransfer.mockResolvedValue(undefined);

        const outcome = dispatcher.ftOnTransfer(TOKEN_A, 'alice.test', 1_000_000_000n, 'swap');

        expect(outcome.kind).toBe('pending');
        if (outcome.kind !== 'pending') return;
        expect(coordinator.getSwap(outcome.swapId)?.amountOut).toBe(333_333_333_333_333_333n);
        await expect(outcome.refund).resolves.toBe(0n);
        expect(store.getBalance(TOKEN_A)).toBe(3_000_000_000n);
        expect(store.getBalance(TOKEN_B)).toBe(666_666_666_666_666_667n);
    });

    test('rejects notifications from a ledger outside the pair without mutating', () => {
        const { store, client, dispatcher } = setup();
        dispatcher.ftOnTransfer(TOKEN_A, OWNER, 1_000n, '');

        const err = captureError(() => dispatcher.ftOnTransfer('token-c.test', OWNER, 1_000n, ''));

        expect(err).toMatchObject({ code: 'UNSUPPORTED_TOKEN' });
        expect(store.getBalance(TOKEN_A)).toBe(1_000n);
        expect(store.getBalance(TOKEN_B)).toBe(0n);
        expect(client.ftTransfer).not.toHaveBeenCalled();
    });

    test('checks the caller before the amount', () => {
        const { dispatcher } = setup();
        expect(captureError(() => dispatcher.ftOnTransfer('token-c.test', OWNER, 0n, '')))
            .toMatchObject({ code: 'UNSUPPORTED_TOKEN' });
    });

    test('rejects a zero amount', () => {
        const { store, dispatcher } = setup();

        expect(captureError(() => dispatcher.ftOnTransfer(TOKEN_A, OWNER, 0n, '')))
            .toMatchObject({ code: 'ZERO_AMOUNT' });
        expect(captureError(() => dispatcher.ftOnTransfer(TOKEN_A, 'alice.test', 0n, '')))
            .toMatchObject({ code: 'ZERO_AMOUNT' });
        expect(store.getBalance(TOKEN_A)).toBe(0n);
    });

    test('rejects an amount beyond 128 bits', () => {
        const { dispatcher } = setup();
        expect(captureError(() => dispatcher.ftOnTransfer(TOKEN_A, OWNER, U128_MAX + 1n, '')))
            .toMatchObject({ code: 'ARITHMETIC_OVERFLOW' });
    });

    test('a swap against an empty pool fails ZERO_OUTPUT', () => {
        const { client, dispatcher } = setup();

        expect(captureError(() => dispatcher.ftOnTransfer(TOKEN_A, 'alice.test', 10n, '')))
            .toMatchObject({ code: 'ZERO_OUTPUT' });
        expect(client.ftTransfer).not.toHaveBeenCalled();
    });
});
