import { GachaError } from '../errors.js';
import type { PriceFeed } from '../types.js';

export const TOKEN_DECIMALS = 18;
export const PRICE_FEED_DECIMALS = 8;
export const TOKEN_UNIT = 10n ** BigInt(TOKEN_DECIMALS);
export const ONE_USD = 10n ** BigInt(PRICE_FEED_DECIMALS);

export type PricingOptions = {
    /** USD price of one whole token, 8 decimals. */
    tokenPriceUsd?: bigint;
    /** Reject prices older than this; 0 disables the check. */
    maxPriceAgeSeconds?: number;
    now?: () => number;
};

export class PricingOracleAdapter {
    private readonly tokenPriceUsd: bigint;
    private readonly maxPriceAgeSeconds: number;
    private readonly now: () => number;

    constructor(private readonly feed: PriceFeed, options: PricingOptions = {}) {
        this.tokenPriceUsd = options.tokenPriceUsd ?? ONE_USD;
        this.maxPriceAgeSeconds = options.maxPriceAgeSeconds ?? 0;
        this.now = options.now ?? (() => Math.floor(Date.now() / 1000));
        if (this.tokenPriceUsd <= 0n) {
            throw new GachaError('INVALID_PRICE', 'token price must be positive');
        }
    }

    // Asset base units owed for `amount` token base units, from the live feed
    async quote(amount: bigint): Promise<bigint> {
        if (amount === 0n) throw new GachaError('ZERO_AMOUNT', 'amount must be non-zero');
        if (amount < TOKEN_UNIT) {
            throw new GachaError('BELOW_MINIMUM', `amount ${amount} is below one whole token (${TOKEN_UNIT})`);
        }

        const { answer, updatedAt } = await this.feed.latestPrice();
        if (answer <= 0n) throw new GachaError('INVALID_PRICE', `price feed answered ${answer}`);
        if (this.maxPriceAgeSeconds > 0 && this.now() - updatedAt > this.maxPriceAgeSeconds) {
            throw new GachaError('STALE_PRICE', `price from ${updatedAt} is older than ${this.maxPriceAgeSeconds}s`);
        }

        // USD/asset inverted to asset per whole token, then scaled; multiply before dividing
        const oneUnitInAsset = (TOKEN_UNIT * this.tokenPriceUsd) / answer;
        return (oneUnitInAsset * amount) / TOKEN_UNIT;
    }
}
