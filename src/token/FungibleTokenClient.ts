import http from 'http';
import { createLogger } from '../utils/logger.js';
import { TokenClientError } from './TokenClientError.js';
import type {
    AccountId,
    CallBudget,
    FungibleTokenMetadata,
    TransferArgs,
} from '../types/index.js';
import type winston from 'winston';

/** One smallest unit of the native asset; token ledgers require it on ft_transfer. */
export const ONE_YOCTO = 1n;
export const DEFAULT_CALL_TIMEOUT_MS = 10_000;

/**
 * Outbound side of the pool: the two calls it makes against token ledgers.
 * Each promise settles when the ledger has answered or the budget ran out.
 */
export interface FungibleTokenClient {
    ftMetadata(tokenId: AccountId, budget: CallBudget): Promise<FungibleTokenMetadata>;
    ftTransfer(tokenId: AccountId, args: TransferArgs, budget: CallBudget): Promise<void>;
}

// ── Builder ─────────────────────────────────────────────────

export class HttpFungibleTokenClientBuilder {
    private host = '127.0.0.1';
    private port = 3030;
    private retryAttempts = 3;
    private retryDelay = 500;
    private logger?: winston.Logger;

    withHost(host: string): this {
        this.host = host;
        return this;
    }

    withPort(port: number): this {
        this.port = port;
        return this;
    }

    withRetry(attempts: number, delayMs: number): this {
        this.retryAttempts = attempts;
        this.retryDelay = delayMs;
        return this;
    }

    withLogger(logger: winston.Logger): this {
        this.logger = logger;
        return this;
    }

    build(): HttpFungibleTokenClient {
        return new HttpFungibleTokenClient(
            this.host,
            this.port,
            this.retryAttempts,
            this.retryDelay,
            this.logger || createLogger('info', 'token-client'),
        );
    }
}

// ── Client ──────────────────────────────────────────────────

/**
 * Talks to a ledger gateway that exposes every token contract as
 * `POST /contracts/:tokenId/:method` with JSON arguments.
 */
export class HttpFungibleTokenClient implements FungibleTokenClient {
    constructor(
        private readonly host: string,
        private readonly port: number,
        private readonly retryAttempts: number,
        private readonly retryDelay: number,
        private readonly logger: winston.Logger,
    ) { }

    /**
     * Reads the token's metadata. Read-only, so it is retried.
     */
    async ftMetadata(tokenId: AccountId, budget: CallBudget): Promise<FungibleTokenMetadata> {
        const path = contractPath(tokenId, 'ft_metadata');
        const data = await this.requestWithRetry(path, '{}', budget, Date.now() + budget.timeoutMs);
        return parseMetadata(data, path);
    }

    /**
     * Moves `amount` of `tokenId` from the pool to `receiverId`.
     * Sent exactly once: a retry after a lost response could pay twice.
     */
    async ftTransfer(tokenId: AccountId, args: TransferArgs, budget: CallBudget): Promise<void> {
        const path = contractPath(tokenId, 'ft_transfer');
        const body = JSON.stringify({
            receiver_id: args.receiverId,
            amount: args.amount.toString(),
            memo: args.memo ?? null,
        });
        this.logger.debug(`POST ${path}`, { receiver: args.receiverId, amount: args.amount.toString() });
        await this.doRequest(path, body, budget, Date.now() + budget.timeoutMs);
    }

    // ── Internal HTTP helper with retry ─────────────────────

    /** Attempts and backoff share one deadline. */
    private async requestWithRetry(path: string, body: string, budget: CallBudget, deadline: number): Promise<string> {
        let lastError: Error | undefined;

        for (let attempt = 0; attempt < this.retryAttempts; attempt++) {
            if (Date.now() >= deadline) {
                throw budgetExhausted(path, budget);
            }
            try {
                this.logger.debug(`POST ${path}`, { attempt: attempt + 1 });
                return await this.doRequest(path, body, budget, deadline);
            } catch (err) {
                lastError = err instanceof Error ? err : new Error(String(err));
                this.logger.error(`Request failed: ${lastError.message}`, {
                    attempt: attempt + 1,
                    path,
                });

                if (lastError instanceof TokenClientError && lastError.isClientError) {
                    throw lastError;
                }

                if (attempt < this.retryAttempts - 1) {
                    const delay = this.retryDelay * Math.pow(2, attempt);
                    await this.sleep(Math.min(delay, Math.max(deadline - Date.now(), 0)));
                }
            }
        }

        throw lastError ?? new TokenClientError('Unknown error', path);
    }

    /** Rejects once `deadline` passes, however far the exchange has got. */
    private doRequest(path: string, body: string, budget: CallBudget, deadline: number): Promise<string> {
        return new Promise<string>((resolve, reject) => {
            const remaining = deadline - Date.now();
            if (remaining <= 0) {
                reject(budgetExhausted(path, budget));
                return;
            }

            const options: http.RequestOptions = {
                hostname: this.host,
                port: this.port,
                path,
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    'Content-Length': Buffer.byteLength(body),
                    'x-attached-deposit': budget.attachedDeposit.toString(),
                },
            };

            const req = http.request(options, (res) => {
                const chunks: Buffer[] = [];
                res.on('data', (chunk: Buffer) => chunks.push(chunk));
                res.on('error', (err) => {
                    clearTimeout(timer);
                    reject(new TokenClientError(`Response aborted: ${err.message}`, path, res.statusCode, err));
                });
                res.on('end', () => {
                    clearTimeout(timer);
                    const responseBody = Buffer.concat(chunks).toString('utf-8');
                    if (res.statusCode && res.statusCode >= 200 && res.statusCode < 300) {
                        resolve(responseBody);
                    } else {
                        reject(
                            new TokenClientError(
                                `HTTP ${res.statusCode}: ${responseBody}`,
                                path,
                                res.statusCode,
                            ),
                        );
                    }
                });
            });

            const timer = setTimeout(() => {
                reject(budgetExhausted(path, budget));
                req.destroy();
            }, remaining);

            req.on('error', (err) => {
                clearTimeout(timer);
                reject(new TokenClientError(`Connection error: ${err.message}`, path, undefined, err));
            });

            req.write(body);
            req.end();
        });
    }

    private sleep(ms: number): Promise<void> {
        return new Promise((resolve) => setTimeout(resolve, ms));
    }
}

function budgetExhausted(path: string, budget: CallBudget): TokenClientError {
    return new TokenClientError(`Call budget of ${budget.timeoutMs}ms exhausted`, path);
}

function contractPath(tokenId: AccountId, method: string): string {
    return `/contracts/${encodeURIComponent(tokenId)}/${method}`;
}

function parseMetadata(data: string, path: string): FungibleTokenMetadata {
    let parsed: unknown;
    try {
        parsed = JSON.parse(data);
    } catch (err) {
        throw new TokenClientError('Metadata response is not JSON', path, undefined, err instanceof Error ? err : undefined);
    }
    if (
        typeof parsed !== 'object' || parsed === null
        || !('name' in parsed) || typeof parsed.name !== 'string'
        || !('symbol' in parsed) || typeof parsed.symbol !== 'string'
        || !('decimals' in parsed) || typeof parsed.decimals !== 'number'
    ) {
        throw new TokenClientError('Metadata response is missing name, symbol or decimals', path);
    }
    const spec = 'spec' in parsed && typeof parsed.spec === 'string' ? parsed.spec : 'ft-1.0.0';
    return {
        spec,
        name: parsed.name,
        symbol: parsed.symbol,
        decimals: parsed.decimals,
        icon: 'icon' in parsed && typeof parsed.icon === 'string' ? parsed.icon : null,
        reference: 'reference' in parsed && typeof parsed.reference === 'string' ? parsed.reference : null,
        reference_hash: 'reference_hash' in parsed && typeof parsed.reference_hash === 'string'
            ? parsed.reference_hash
            : null,
    };
}
