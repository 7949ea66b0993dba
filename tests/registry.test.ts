import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { SqliteBeastRegistry } from '../src/db/beasts.js';
import { openDatabase, type Db } from '../src/db/index.js';
import { isGachaError } from '../src/errors.js';
import type { MintedAttributes } from '../src/types.js';
import { ENGINE, testCatalog } from './helpers.js';

const fireBeast: MintedAttributes = {
    templateId: 1,
    rarity: 'legendary',
    hp: 65535,
    attack: 1500,
    defense: 4500,
    element: 'fire'
};

function caught(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    return undefined;
}

describe('SqliteBeastRegistry', () => {
    let db: Db;
    let registry: SqliteBeastRegistry;

    beforeEach(() => {
        db = openDatabase(':memory:');
        registry = new SqliteBeastRegistry(db, testCatalog(), ENGINE);
    });

    afterEach(() => {
        db.close();
    });

    it('only lets the minter mint', () => {
        expect(isGachaError(caught(() => registry.mint('alice', 'alice', fireBeast, 'vrf-1')), 'UNAUTHORIZED')).toBe(true);
        expect(registry.totalMinted()).toBe(0);
    });

    it('refuses templates outside the catalog', () => {
        const error = caught(() => registry.mint(ENGINE, 'alice', { ...fireBeast, templateId: 9 }, 'vrf-1'));
        expect(isGachaError(error, 'UNKNOWN_TEMPLATE')).toBe(true);
    });

    it('assigns sequential ids and tracks owners', () => {
        expect(registry.mint(ENGINE, 'alice', fireBeast, 'vrf-1')).toBe(1);
        expect(registry.mint(ENGINE, 'bob', { ...fireBeast, templateId: 3, element: 'thunder' }, 'vrf-2')).toBe(2);
        expect(registry.mint(ENGINE, 'alice', { ...fireBeast, rarity: 'common' }, 'vrf-3')).toBe(3);

        expect(registry.ownerOf(2)).toBe('bob');
        expect(registry.ownerOf(4)).toBeUndefined();
        expect(registry.beastsOf('alice').map((b) => [b.id, b.rarity])).toEqual([
            [1, 'legendary'],
            [3, 'common']
        ]);
        expect(registry.get(1)).toMatchObject({ owner: 'alice', requestId: 'vrf-1', ...fireBeast });
        expect(registry.totalMinted()).toBe(3);
    });

    it('renders metadata from the catalog template', () => {
        registry.mint(ENGINE, 'alice', fireBeast, 'vrf-1');
        expect(registry.metadata(1)).toEqual({
            name: 'Fire Beast #1',
            image: 'a.png',
            attributes: [
                { trait_type: 'Template', value: 1 },
                { trait_type: 'Element', value: 'Fire' },
                { trait_type: 'Rarity', value: 'Legendary' },
                { trait_type: 'HP', value: 65535 },
                { trait_type: 'Attack', value: 1500 },
                { trait_type: 'Defense', value: 4500 }
            ]
        });
        expect(registry.metadata(2)).toBeUndefined();
    });
});
