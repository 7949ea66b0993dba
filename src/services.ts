import type { BeastCatalog } from './core/catalog.js';
import { GachaEngine } from './core/engine.js';
import { GachaEvents } from './core/events.js';
import { PricingOracleAdapter } from './core/pricing.js';
import { TokenShop } from './core/shop.js';
import { transactional, type Db } from './db/index.js';
import { SqliteBeastRegistry } from './db/beasts.js';
import { SqliteTokenLedger } from './db/ledger.js';
import { LocalRandomnessCoordinator } from './db/randomness.js';
import { SqliteRollStore } from './db/rolls.js';
import { SqliteTreasury } from './db/treasury.js';
import type { PriceFeed } from './types.js';

export type ServiceOptions = {
    catalog: BeastCatalog;
    priceFeed: PriceFeed;
    rollPrice: bigint;
    tokenPriceUsd?: bigint;
    maxPriceAgeSeconds?: number;
    engineId: string;
    coordinatorId: string;
    ownerId: string;
    vrfSecret: string;
    numWords?: number;
    drawWord?: () => bigint;
};

export type GachaServices = {
    db: Db;
    catalog: BeastCatalog;
    events: GachaEvents;
    ledger: SqliteTokenLedger;
    treasury: SqliteTreasury;
    registry: SqliteBeastRegistry;
    coordinator: LocalRandomnessCoordinator;
    pricing: PricingOracleAdapter;
    shop: TokenShop;
    engine: GachaEngine;
};

export function createGachaServices(db: Db, options: ServiceOptions): GachaServices {
    const atomic = transactional(db);
    const events = new GachaEvents();
    const ledger = new SqliteTokenLedger(db, options.engineId);
    const treasury = new SqliteTreasury(db);
    const registry = new SqliteBeastRegistry(db, options.catalog, options.engineId);
    const coordinator = new LocalRandomnessCoordinator(db, {
        id: options.coordinatorId,
        secret: options.vrfSecret,
        drawWord: options.drawWord
    });
    const pricing = new PricingOracleAdapter(options.priceFeed, {
        tokenPriceUsd: options.tokenPriceUsd,
        maxPriceAgeSeconds: options.maxPriceAgeSeconds
    });
    const shop = new TokenShop({
        owner: options.ownerId,
        pricing,
        tokens: ledger,
        treasury,
        gateway: treasury,
        atomic,
        events
    });
    const engine = new GachaEngine({
        identity: options.engineId,
        rollPrice: options.rollPrice,
        numWords: options.numWords,
        catalog: options.catalog,
        ledger,
        randomness: coordinator,
        registry,
        rolls: new SqliteRollStore(db),
        atomic,
        events
    });

    return { db, catalog: options.catalog, events, ledger, treasury, registry, coordinator, pricing, shop, engine };
}
