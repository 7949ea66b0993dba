import type { BeastCatalog } from '../core/catalog.js';
import { GachaError } from '../errors.js';
import type { Beast, MintedAttributes, NFTRegistry } from '../types.js';
import type { Db } from './index.js';

export type BeastMetadata = {
    name: string;
    image: string;
    attributes: { trait_type: string; value: string | number }[];
};

const SELECT_BEAST = `SELECT id, owner, template_id as templateId, element, rarity, hp, attack, defense,
       request_id as requestId, created_at as createdAt
  FROM beasts`;

function titleCase(value: string): string {
    return value.charAt(0).toUpperCase() + value.slice(1);
}

export class SqliteBeastRegistry implements NFTRegistry {
    constructor(
        private readonly db: Db,
        private readonly catalog: BeastCatalog,
        readonly minter: string
    ) {}

    mint(caller: string, to: string, attributes: MintedAttributes, requestId: string): number {
        if (caller !== this.minter) {
            throw new GachaError('UNAUTHORIZED', `${caller} may not mint beasts`);
        }
        this.catalog.require(attributes.templateId);
        const { lastInsertRowid } = this.db.prepare(`INSERT INTO beasts
              (owner, template_id, element, rarity, hp, attack, defense, request_id, created_at)
              VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`)
            .run(
                to,
                attributes.templateId,
                attributes.element,
                attributes.rarity,
                attributes.hp,
                attributes.attack,
                attributes.defense,
                requestId,
                Date.now()
            );
        return Number(lastInsertRowid);
    }

    get(id: number): Beast | undefined {
        return this.db.prepare<[number], Beast>(`${SELECT_BEAST} WHERE id = ?`).get(id);
    }

    ownerOf(id: number): string | undefined {
        return this.get(id)?.owner;
    }

    beastsOf(owner: string): Beast[] {
        return this.db.prepare<[string], Beast>(`${SELECT_BEAST} WHERE owner = ? ORDER BY id`).all(owner);
    }

    totalMinted(): number {
        const row = this.db.prepare<[], { total: number }>(`SELECT COUNT(*) as total FROM beasts`).get();
        return row?.total ?? 0;
    }

    metadata(id: number): BeastMetadata | undefined {
        const beast = this.get(id);
        if (!beast) return undefined;
        const template = this.catalog.require(beast.templateId);
        return {
            name: `${titleCase(beast.element)} Beast #${beast.id}`,
            image: template.image,
            attributes: [
                { trait_type: 'Template', value: beast.templateId },
                { trait_type: 'Element', value: titleCase(beast.element) },
                { trait_type: 'Rarity', value: titleCase(beast.rarity) },
                { trait_type: 'HP', value: beast.hp },
                { trait_type: 'Attack', value: beast.attack },
                { trait_type: 'Defense', value: beast.defense }
            ]
        };
    }
}
