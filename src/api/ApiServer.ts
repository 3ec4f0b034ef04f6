import http from 'node:http';
import type { AutomatedMarketMaker } from '../amm/AutomatedMarketMaker.js';
import { AmmError } from '../amm/AmmError.js';
import { createLogger } from '../utils/logger.js';
import type { SwapRecord } from '../types/index.js';
import type winston from 'winston';

class BadRequestError extends Error { }

function decodeSegment(segment: string): string {
    try {
        return decodeURIComponent(segment);
    } catch {
        throw new BadRequestError(`Malformed path segment: ${segment}`);
    }
}

/**
 * ApiServer — HTTP surface of the pool.
 *
 * Endpoints:
 *   GET  /health                    → { status: 'ok', owner, tokens }
 *   GET  /metadata/:token           → { name, symbol, decimals }
 *   GET  /balance/:token            → { token, balance }
 *   GET  /ratio                     → { ratio }
 *   GET  /swaps                     → { swaps: [...] }
 *   GET  /swaps/:id                 → swap record
 *   POST /metadata/:token/refresh   → { token, status }
 *   POST /ft_on_transfer            → { refund }
 *
 * Amounts travel as decimal strings.
 */
export class ApiServer {
    private server: http.Server | null = null;

    constructor(
        private readonly amm: AutomatedMarketMaker,
        private readonly logger: winston.Logger = createLogger('info', 'api'),
    ) { }

    start(port: number = 3000): Promise<void> {
        return new Promise((resolve) => {
            this.server = http.createServer((req, res) => {
                this.handleRequest(req, res).catch((err: unknown) => this.sendError(res, err));
            });

            this.server.listen(port, () => {
                this.logger.info(`API server listening on :${this.port}`);
                resolve();
            });
        });
    }

    stop(): Promise<void> {
        return new Promise((resolve) => {
            if (this.server) {
                this.server.close(() => resolve());
            } else {
                resolve();
            }
        });
    }

    /** Port actually bound; differs from the requested one when that was 0. */
    get port(): number {
        const address = this.server?.address();
        return address && typeof address === 'object' ? address.port : 0;
    }

    private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
        const url = new URL(req.url ?? '/', `http://localhost`);
        const segments = url.pathname.split('/').filter(Boolean).map(decodeSegment);
        const method = req.method ?? 'GET';

        if (method === 'GET' && url.pathname === '/health') {
            return this.sendJson(res, 200, {
                status: 'ok',
                owner: this.amm.owner,
                tokens: this.amm.tokens,
            });
        }

        if (method === 'GET' && segments.length === 2 && segments[0] === 'metadata') {
            return this.sendJson(res, 200, this.amm.getMetadata(segments[1]));
        }

        if (method === 'GET' && segments.length === 2 && segments[0] === 'balance') {
            const balance = this.amm.getBalance(segments[1]);
            return this.sendJson(res, 200, { token: segments[1], balance: balance.toString() });
        }

        if (method === 'GET' && url.pathname === '/ratio') {
            return this.sendJson(res, 200, { ratio: this.amm.getRatio().toString() });
        }

        if (method === 'GET' && url.pathname === '/swaps') {
            return this.sendJson(res, 200, { swaps: this.amm.listSwaps().map(serializeSwap) });
        }

        if (method === 'GET' && segments.length === 2 && segments[0] === 'swaps') {
            const swap = this.amm.getSwap(segments[1]);
            if (!swap) return this.sendJson(res, 404, { error: 'Swap not found' });
            return this.sendJson(res, 200, serializeSwap(swap));
        }

        if (method === 'POST' && segments.length === 3 && segments[0] === 'metadata' && segments[2] === 'refresh') {
            const status = await this.amm.requestMetadataRefresh(segments[1]);
            return this.sendJson(res, 200, { token: segments[1], status });
        }

        if (method === 'POST' && url.pathname === '/ft_on_transfer') {
            const predecessor = req.headers['x-predecessor-account-id'];
            if (typeof predecessor !== 'string' || predecessor.length === 0) {
                throw new BadRequestError('x-predecessor-account-id header is required');
            }
            const body = await this.readJson(req);
            const senderId = body.sender_id;
            const amount = body.amount;
            const msg = body.msg ?? '';
            if (typeof senderId !== 'string' || typeof amount !== 'string' || !/^\d+$/.test(amount) || typeof msg !== 'string') {
                throw new BadRequestError('sender_id and amount (decimal string) are required');
            }

            const outcome = this.amm.ftOnTransfer(predecessor, senderId, BigInt(amount), msg);
            const refund = outcome.kind === 'value' ? outcome.refund : await outcome.refund;
            return this.sendJson(res, 200, { refund: refund.toString() });
        }

        this.sendJson(res, 404, { error: 'Not found' });
    }

    private readJson(req: http.IncomingMessage): Promise<Record<string, unknown>> {
        return new Promise((resolve, reject) => {
            const chunks: Buffer[] = [];
            req.on('data', (chunk: Buffer) => chunks.push(chunk));
            req.on('end', () => {
                try {
                    const parsed: unknown = JSON.parse(Buffer.concat(chunks).toString('utf-8') || '{}');
                    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
                        reject(new BadRequestError('Body must be a JSON object'));
                        return;
                    }
                    resolve(Object.fromEntries(Object.entries(parsed)));
                } catch {
                    reject(new BadRequestError('Invalid JSON body'));
                }
            });
            req.on('error', reject);
        });
    }

    private sendError(res: http.ServerResponse, err: unknown): void {
        if (err instanceof AmmError) {
            this.sendJson(res, err.code === 'UNKNOWN_TOKEN' ? 404 : 400, { error: err.message, code: err.code });
            return;
        }
        if (err instanceof BadRequestError) {
            this.sendJson(res, 400, { error: err.message, code: 'BAD_REQUEST' });
            return;
        }
        const message = err instanceof Error ? err.message : String(err);
        this.logger.error(`Request failed: ${message}`);
        this.sendJson(res, 500, { error: message });
    }

    private sendJson(res: http.ServerResponse, status: number, body: unknown): void {
        res.writeHead(status, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify(body));
    }
}

function serializeSwap(swap: SwapRecord): Record<string, unknown> {
    return {
        ...swap,
        amountIn: swap.amountIn.toString(),
        amountOut: swap.amountOut.toString(),
        newBalanceIn: swap.newBalanceIn.toString(),
        newBalanceOut: swap.newBalanceOut.toString(),
    };
}
