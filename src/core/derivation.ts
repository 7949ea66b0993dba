import { GachaError } from '../errors.js';
import type { MintedAttributes, Rarity } from '../types.js';
import type { BeastCatalog } from './catalog.js';
import { bufferToBigInt, sha256, uint256ToBuffer } from './rng.js';

export type Range = { readonly min: number; readonly max: number };

export const HP_RANGE: Range = { min: 15000, max: 65535 };
export const ATTACK_RANGE: Range = { min: 1500, max: 4500 };
export const DEFENSE_RANGE: Range = { min: 1500, max: 4500 };
export const RARITY_ROLL_RANGE: Range = { min: 1, max: 100 };

// Inclusive upper bounds of the rarity roll, checked in order (50/30/15/5)
export const RARITY_THRESHOLDS: ReadonlyArray<{ upTo: number; rarity: Rarity }> = [
    { upTo: 50, rarity: 'common' },
    { upTo: 80, rarity: 'rare' },
    { upTo: 95, rarity: 'unique' },
    { upTo: 100, rarity: 'legendary' }
];

export const FIELD_TAGS = {
    beast: 'beast',
    hp: 'hp',
    attack: 'attack',
    defense: 'defense',
    rarity: 'rarity'
} as const;

export type FieldTag = (typeof FIELD_TAGS)[keyof typeof FIELD_TAGS];

// The request id salts the seed so a repeated random word still yields independent rolls
export function deriveBaseSeed(randomWord: bigint, requestId: string): Buffer {
    return sha256(Buffer.concat([uint256ToBuffer(randomWord), Buffer.from(`request:${requestId}`, 'utf8')]));
}

export function deriveInRange(baseSeed: Buffer, tag: FieldTag, range: Range): number {
    const digest = sha256(Buffer.concat([baseSeed, Buffer.from(tag, 'utf8')]));
    const span = BigInt(range.max - range.min + 1);
    return Number(bufferToBigInt(digest) % span) + range.min;
}

export function rarityFromRoll(roll: number): Rarity {
    if (!Number.isInteger(roll) || roll < RARITY_ROLL_RANGE.min || roll > RARITY_ROLL_RANGE.max) {
        throw new GachaError('OUT_OF_BOUND', `rarity roll ${roll} outside 1..100`);
    }
    const tier = RARITY_THRESHOLDS.find((t) => roll <= t.upTo);
    if (!tier) throw new GachaError('OUT_OF_BOUND', `no rarity tier covers ${roll}`);
    return tier.rarity;
}

export function deriveAttributes(catalog: BeastCatalog, randomWord: bigint, requestId: string): MintedAttributes {
    const seed = deriveBaseSeed(randomWord, requestId);
    const template = catalog.at(deriveInRange(seed, FIELD_TAGS.beast, { min: 0, max: catalog.size - 1 }));
    return {
        templateId: template.templateId,
        rarity: rarityFromRoll(deriveInRange(seed, FIELD_TAGS.rarity, RARITY_ROLL_RANGE)),
        hp: deriveInRange(seed, FIELD_TAGS.hp, HP_RANGE),
        attack: deriveInRange(seed, FIELD_TAGS.attack, ATTACK_RANGE),
        defense: deriveInRange(seed, FIELD_TAGS.defense, DEFENSE_RANGE),
        element: template.element
    };
}
