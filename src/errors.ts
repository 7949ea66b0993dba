export type GachaErrorKind =
    | 'validation'
    | 'state_conflict'
    | 'insufficient_funds'
    | 'external_transfer'
    | 'oracle'
    | 'unauthorized';

const KIND_BY_CODE = {
    ZERO_AMOUNT: 'validation',
    BELOW_MINIMUM: 'validation',
    LENGTH_MISMATCH: 'validation',
    ZERO_VALUE: 'validation',
    OUT_OF_BOUND: 'validation',
    EMPTY_CATALOG: 'validation',
    DUPLICATE_TEMPLATE: 'validation',
    EMPTY_RANDOMNESS: 'validation',
    UNKNOWN_TEMPLATE: 'validation',
    UNDERPAID: 'validation',
    DIRECT_PAYMENT_REJECTED: 'validation',
    ROLL_NOT_IDLE: 'state_conflict',
    INSUFFICIENT_FUNDS: 'insufficient_funds',
    TRANSFER_FAILED: 'external_transfer',
    REFUND_FAILED: 'external_transfer',
    INVALID_PRICE: 'oracle',
    STALE_PRICE: 'oracle',
    PRICE_FEED_UNAVAILABLE: 'oracle',
    UNAUTHORIZED: 'unauthorized'
} as const satisfies Record<string, GachaErrorKind>;

export type GachaErrorCode = keyof typeof KIND_BY_CODE;

export class GachaError extends Error {
    readonly kind: GachaErrorKind;

    constructor(
        public readonly code: GachaErrorCode,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'GachaError';
        this.kind = KIND_BY_CODE[code];
    }
}

export function isGachaError(error: unknown, code?: GachaErrorCode): error is GachaError {
    return error instanceof GachaError && (code === undefined || error.code === code);
}
