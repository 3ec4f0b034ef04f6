/**
 * Failure of an outbound call to a token ledger.
 * Wraps HTTP errors, connection failures and malformed responses.
 */
export class TokenClientError extends Error {
    public readonly statusCode?: number;
    public readonly endpoint: string;
    public override readonly cause?: Error;

    constructor(message: string, endpoint: string, statusCode?: number, cause?: Error) {
        super(message);
        this.name = 'TokenClientError';
        this.endpoint = endpoint;
        this.statusCode = statusCode;
        this.cause = cause;
    }

    /** HTTP 4xx: the ledger understood and refused the call. */
    get isClientError(): boolean {
        return this.statusCode !== undefined && this.statusCode >= 400 && this.statusCode < 500;
    }
}
