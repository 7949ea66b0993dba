import { BeastCatalog } from '../src/core/catalog.js';
import { openDatabase } from '../src/db/index.js';
import { StaticPriceFeed } from '../src/oracle/feeds.js';
import { createGachaServices, type ServiceOptions } from '../src/services.js';

export const TOKEN = 10n ** 18n;
export const ROLL_PRICE = 10n * TOKEN;
export const ETH_USD = 2000n * 10n ** 8n;

export const ENGINE = 'engine';
export const COORDINATOR = 'coordinator';
export const OWNER = 'owner';

export function testCatalog(): BeastCatalog {
    return BeastCatalog.fromSeed({
        templateIds: [1, 2, 3],
        elements: [1, 2, 4],
        images: ['a.png', 'b.png', 'c.png']
    });
}

// Counter-based words so runs are reproducible
export function sequentialWords(step = 7919n): () => bigint {
    let counter = 0n;
    return () => {
        counter += 1n;
        return counter * step;
    };
}

export function createTestServices(overrides: Partial<ServiceOptions> = {}) {
    const db = openDatabase(':memory:');
    const feed = new StaticPriceFeed(ETH_USD);
    const services = createGachaServices(db, {
        catalog: testCatalog(),
        priceFeed: feed,
        rollPrice: ROLL_PRICE,
        engineId: ENGINE,
        coordinatorId: COORDINATOR,
        ownerId: OWNER,
        vrfSecret: 'test-secret',
        drawWord: sequentialWords(),
        ...overrides
    });
    return { ...services, feed };
}
