import dotenv from 'dotenv';

dotenv.config();

type Env = Record<string, string | undefined>;

export function intFromEnv(name: string, fallback: number, env: Env = process.env): number {
    const raw = env[name];
    if (!raw) return fallback;
    const parsed = Number.parseInt(raw, 10);
    return Number.isFinite(parsed) ? parsed : fallback;
}

// Fixed-point amounts overflow Number, so they are read as integer strings
export function bigintFromEnv(name: string, fallback: bigint, env: Env = process.env): bigint {
    const raw = env[name]?.trim();
    if (!raw || !/^\d+$/.test(raw)) return fallback;
    return BigInt(raw);
}

export const NODE_ENV = process.env.NODE_ENV ?? 'development';
export const PORT = intFromEnv('PORT', 3000);
export const DB_PATH = process.env.DB_PATH ?? './data.sqlite';
export const CATALOG_PATH = process.env.CATALOG_PATH ?? './data/beasts.json';
export const CORS_ORIGINS = (process.env.CORS_ORIGINS ?? 'http://localhost:5173').split(',').map((o) => o.trim());

// Identities of the parties allowed to call restricted operations
export const ENGINE_ID = process.env.ENGINE_ID ?? 'gacha-engine';
export const COORDINATOR_ID = process.env.COORDINATOR_ID ?? 'vrf-coordinator';
export const OWNER_ID = process.env.OWNER_ID ?? 'owner';

// Token amounts are 18-decimal base units: 10 tokens per roll
export const ROLL_PRICE = bigintFromEnv('ROLL_PRICE', 10n * 10n ** 18n);
// USD price of one whole token, 8 decimals (100000000 = $1.00)
export const TOKEN_PRICE_USD = bigintFromEnv('TOKEN_PRICE_USD', 100_000_000n);

// Empty PRICE_FEED_URL falls back to a fixed STATIC_PRICE (8 decimals, USD per asset unit)
export const PRICE_FEED_URL = process.env.PRICE_FEED_URL ?? '';
export const STATIC_PRICE = bigintFromEnv('STATIC_PRICE', 2000n * 10n ** 8n);
// 0 disables the staleness check
export const MAX_PRICE_AGE_SECONDS = intFromEnv('MAX_PRICE_AGE_SECONDS', 3600);

export const VRF_SECRET = process.env.VRF_SECRET ?? 'change_me';
export const VRF_NUM_WORDS = intFromEnv('VRF_NUM_WORDS', 1);
export const FULFILL_CRON = process.env.FULFILL_CRON ?? '*/5 * * * * *';
