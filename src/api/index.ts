import {
    CATALOG_PATH,
    COORDINATOR_ID,
    CORS_ORIGINS,
    DB_PATH,
    ENGINE_ID,
    FULFILL_CRON,
    MAX_PRICE_AGE_SECONDS,
    OWNER_ID,
    PORT,
    PRICE_FEED_URL,
    ROLL_PRICE,
    STATIC_PRICE,
    TOKEN_PRICE_USD,
    VRF_NUM_WORDS,
    VRF_SECRET
} from '../config.js';
import { loadCatalogFile } from '../core/catalog.js';
import { openDatabase } from '../db/index.js';
import { HttpPriceFeed, StaticPriceFeed } from '../oracle/feeds.js';
import { createGachaServices } from '../services.js';
import { createApp } from './app.js';
import { startFulfiller } from './fulfiller.js';

if (VRF_SECRET === 'change_me') {
    console.warn('VRF_SECRET is not set, using the development default');
}

const db = openDatabase(DB_PATH);
const catalog = loadCatalogFile(CATALOG_PATH);
const priceFeed = PRICE_FEED_URL ? new HttpPriceFeed(PRICE_FEED_URL) : new StaticPriceFeed(STATIC_PRICE);

const services = createGachaServices(db, {
    catalog,
    priceFeed,
    rollPrice: ROLL_PRICE,
    tokenPriceUsd: TOKEN_PRICE_USD,
    maxPriceAgeSeconds: PRICE_FEED_URL ? MAX_PRICE_AGE_SECONDS : 0,
    engineId: ENGINE_ID,
    coordinatorId: COORDINATOR_ID,
    ownerId: OWNER_ID,
    vrfSecret: VRF_SECRET,
    numWords: VRF_NUM_WORDS
});

services.events.on('rollStarted', ({ requestId, user }) => console.log(`Roll started: ${requestId} for ${user}`));
services.events.on('rollFulfilled', ({ requestId, user, beastId }) =>
    console.log(`Roll fulfilled: ${requestId} -> beast #${beastId} for ${user}`)
);
services.events.on('tokenPurchased', ({ user, amount }) => console.log(`Tokens purchased: ${amount} by ${user}`));

const fulfiller = startFulfiller(services, FULFILL_CRON);
const app = createApp(services, CORS_ORIGINS);

const server = app.listen(PORT, () => {
    console.log(`API server running on port ${PORT} (${catalog.size} beast templates)`);
});

// Graceful shutdown
process.on('SIGINT', () => {
    console.log('Shutting down...');
    fulfiller.stop();
    server.close(() => {
        db.close();
        process.exit(0);
    });
});
