import axios from 'axios';
import { z } from 'zod';
import { GachaError } from '../errors.js';
import type { PriceFeed, PriceRound } from '../types.js';

export class StaticPriceFeed implements PriceFeed {
    private round: PriceRound;

    constructor(answer: bigint, updatedAt = Math.floor(Date.now() / 1000)) {
        this.round = { answer, updatedAt };
    }

    setPrice(answer: bigint, updatedAt = Math.floor(Date.now() / 1000)): void {
        this.round = { answer, updatedAt };
    }

    async latestPrice(): Promise<PriceRound> {
        return { ...this.round };
    }
}

export type JsonFetcher = (url: string) => Promise<unknown>;

const PriceRoundSchema = z.object({
    answer: z.union([z.string().regex(/^-?\d+$/), z.number().int()]),
    updatedAt: z.number().int().nonnegative()
});

async function axiosFetchJson(url: string): Promise<unknown> {
    const response = await axios.get<unknown>(url, { timeout: 5000 });
    return response.data;
}

/** Reads `{ answer, updatedAt }` (8-decimal USD per asset unit) from an HTTP endpoint on every call. */
export class HttpPriceFeed implements PriceFeed {
    constructor(private readonly url: string, private readonly fetchJson: JsonFetcher = axiosFetchJson) {}

    async latestPrice(): Promise<PriceRound> {
        let body: unknown;
        try {
            body = await this.fetchJson(this.url);
        } catch (error) {
            throw new GachaError('PRICE_FEED_UNAVAILABLE', `price feed ${this.url} unreachable`, { cause: error });
        }
        const parsed = PriceRoundSchema.safeParse(body);
        if (!parsed.success) {
            throw new GachaError('PRICE_FEED_UNAVAILABLE', `price feed ${this.url} sent a malformed round`);
        }
        return { answer: BigInt(parsed.data.answer), updatedAt: parsed.data.updatedAt };
    }
}
