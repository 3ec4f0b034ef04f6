import http from 'node:http';
import { ApiServer } from '../../src/api/ApiServer.js';
import { AutomatedMarketMaker } from '../../src/amm/AutomatedMarketMaker.js';
import { InMemoryLedger } from '../helpers/InMemoryLedger.js';
import { createLogger } from '../../src/utils/logger.js';

const POOL = 'amm.test';
const OWNER = 'owner.test';
const TOKEN_A = 'token-a.test';
const TOKEN_B = 'token-b.test';

interface JsonResponse {
    status: number;
    body: unknown;
}

function request(
    port: number,
    method: string,
    path: string,
    body?: string,
    headers: Record<string, string> = {},
): Promise<JsonResponse> {
    return new Promise((resolve, reject) => {
        const req = http.request({ hostname: '127.0.0.1', port, method, path, headers, agent: false }, (res) => {
            const chunks: Buffer[] = [];
            res.on('data', (chunk: Buffer) => chunks.push(chunk));
            res.on('end', () => {
                resolve({
                    status: res.statusCode ?? 0,
                    body: JSON.parse(Buffer.concat(chunks).toString('utf-8')),
                });
            });
        });
        req.on('error', reject);
        if (body) req.write(body);
        req.end();
    });
}

function notify(port: number, predecessor: string, payload: Record<string, string>): Promise<JsonResponse> {
    return request(port, 'POST', '/ft_on_transfer', JSON.stringify(payload), {
        'Content-Type': 'application/json',
        'x-predecessor-account-id': predecessor,
    });
}

describe('ApiServer', () => {
    let ledger: InMemoryLedger;
    let api: ApiServer;
    let port: number;

    beforeEach(async () => {
        ledger = new InMemoryLedger(POOL);
        ledger.deploy(TOKEN_A, 'Token A', 'TA', 8).register(POOL);
        ledger.deploy(TOKEN_B, 'Token B', 'TB', 16).register(POOL);

        const amm = AutomatedMarketMaker.create({
            owner: OWNER,
            tokenA: TOKEN_A,
            tokenB: TOKEN_B,
            client: ledger,
            logLevel: 'error',
        });
        await amm.ready();

        api = new ApiServer(amm, createLogger('error', 'api'));
        await api.start(0);
        port = api.port;
    });

    afterEach(async () => {
        await api.stop();
    });

    test('GET /health reports the pair', async () => {
        const res = await request(port, 'GET', '/health');
        expect(res).toEqual({
            status: 200,
            body: { status: 'ok', owner: OWNER, tokens: [TOKEN_A, TOKEN_B] },
        });
    });

    test('GET /metadata/:token returns resolved metadata', async () => {
        const res = await request(port, 'GET', `/metadata/${TOKEN_B}`);
        expect(res).toEqual({ status: 200, body: { name: 'Token B', symbol: 'TB', decimals: 16 } });
    });

    test('unknown tokens are 404 with the error code', async () => {
        const res = await request(port, 'GET', '/balance/token-c.test');
        expect(res.status).toBe(404);
        expect(res.body).toMatchObject({ code: 'UNKNOWN_TOKEN' });
    });

    test('owner deposits over HTTP update balances and ratio', async () => {
        const first = await notify(port, TOKEN_A, { sender_id: OWNER, amount: '1000000000', msg: '' });
        const second = await notify(port, TOKEN_B, { sender_id: OWNER, amount: '1000000000000000000', msg: '' });

        expect(first).toEqual({ status: 200, body: { refund: '0' } });
        expect(second).toEqual({ status: 200, body: { refund: '0' } });
        expect(await request(port, 'GET', `/balance/${TOKEN_A}`)).toEqual({
            status: 200,
            body: { token: TOKEN_A, balance: '1000000000' },
        });
        expect(await request(port, 'GET', '/ratio')).toEqual({ status: 200, body: { ratio: '1000' } });
    });

    test('a swap responds once its transfer has settled', async () => {
        ledger.token(TOKEN_A).mint(POOL, 2_000_000_000n);
        ledger.token(TOKEN_B).register('alice.test');
        await notify(port, TOKEN_A, { sender_id: OWNER, amount: '2000000000' });
        ledger.token(TOKEN_B).mint(POOL, 1_000_000_000_000_000_000n);
        await notify(port, TOKEN_B, { sender_id: OWNER, amount: '1000000000000000000' });

        const res = await notify(port, TOKEN_A, { sender_id: 'alice.test', amount: '1000000000' });

        expect(res).toEqual({ status: 200, body: { refund: '0' } });
        expect(ledger.token(TOKEN_B).balanceOf('alice.test')).toBe(333_333_333_333_333_333n);

        const swaps = await request(port, 'GET', '/swaps');
        expect(swaps.body).toMatchObject({
            swaps: [{ initiator: 'alice.test', amountOut: '333333333333333333', status: 'COMMITTED' }],
        });
    });

    test('a failed payout answers with the full refund', async () => {
        await notify(port, TOKEN_A, { sender_id: OWNER, amount: '2000000000' });
        await notify(port, TOKEN_B, { sender_id: OWNER, amount: '1000000000000000000' });

        // The pool holds no token B on the ledger, so the payout fails
        const res = await notify(port, TOKEN_A, { sender_id: 'alice.test', amount: '1000000000' });

        expect(res).toEqual({ status: 200, body: { refund: '1000000000' } });
        expect(await request(port, 'GET', `/balance/${TOKEN_B}`)).toEqual({
            status: 200,
            body: { token: TOKEN_B, balance: '1000000000000000000' },
        });
    });

    test('validation failures are 400 with the error code', async () => {
        const unsupported = await notify(port, 'token-c.test', { sender_id: OWNER, amount: '10' });
        const zero = await notify(port, TOKEN_A, { sender_id: OWNER, amount: '0' });

        expect(unsupported.status).toBe(400);
        expect(unsupported.body).toMatchObject({ code: 'UNSUPPORTED_TOKEN' });
        expect(zero.status).toBe(400);
        expect(zero.body).toMatchObject({ code: 'ZERO_AMOUNT' });
    });

    test('malformed notifications are rejected', async () => {
        const noHeader = await request(port, 'POST', '/ft_on_transfer', JSON.stringify({ sender_id: OWNER, amount: '1' }));
        const badAmount = await notify(port, TOKEN_A, { sender_id: OWNER, amount: '-5' });

        expect(noHeader).toEqual({
            status: 400,
            body: { error: 'x-predecessor-account-id header is required', code: 'BAD_REQUEST' },
        });
        expect(badAmount.status).toBe(400);
        expect(badAmount.body).toMatchObject({ code: 'BAD_REQUEST' });
    });

    test('POST /metadata/:token/refresh re-resolves metadata', async () => {
        const res = await request(port, 'POST', `/metadata/${TOKEN_A}/refresh`);
        expect(res).toEqual({
            status: 200,
            body: {
                token: TOKEN_A,
                status: { state: 'resolved', metadata: { name: 'Token A', symbol: 'TA', decimals: 8 } },
            },
        });
    });

    test('malformed percent-escapes in the path are 400', async () => {
        const res = await request(port, 'GET', '/balance/%E0%A4%A');
        expect(res).toEqual({
            status: 400,
            body: { error: 'Malformed path segment: %E0%A4%A', code: 'BAD_REQUEST' },
        });
    });

    test('unknown swaps and routes are 404', async () => {
        expect((await request(port, 'GET', '/swaps/nope')).status).toBe(404);
        expect((await request(port, 'GET', '/nowhere')).status).toBe(404);
    });
});
