export type AmmErrorCode =
    | 'UNKNOWN_TOKEN'
    | 'UNSUPPORTED_TOKEN'
    | 'ZERO_AMOUNT'
    | 'ZERO_OUTPUT'
    | 'INSUFFICIENT_LIQUIDITY'
    | 'METADATA_UNAVAILABLE'
    | 'ARITHMETIC_OVERFLOW';

/**
 * Local validation failure of a pool operation.
 * Raised synchronously, before any outbound call is issued.
 */
export class AmmError extends Error {
    public readonly code: AmmErrorCode;

    constructor(code: AmmErrorCode, message: string) {
        super(message);
        this.name = 'AmmError';
        this.code = code;
    }
}
