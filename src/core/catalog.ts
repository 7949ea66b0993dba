import fs from 'node:fs';
import { z } from 'zod';
import { GachaError } from '../errors.js';
import { ELEMENTS, type BeastTemplate, type CatalogSeed, type Element } from '../types.js';

// Wire codes: 0 = none, then ELEMENTS in order
export const MAX_ELEMENT_CODE = ELEMENTS.length;

export function elementFromCode(code: number): Element | undefined {
    if (!Number.isInteger(code) || code < 1 || code > MAX_ELEMENT_CODE) return undefined;
    return ELEMENTS[code - 1];
}

export function elementCode(element: Element): number {
    return ELEMENTS.indexOf(element) + 1;
}

const CatalogSeedSchema = z.object({
    templateIds: z.array(z.number().int().nonnegative()),
    elements: z.array(z.number().int().nonnegative()),
    images: z.array(z.string())
});

export class BeastCatalog {
    private constructor(
        private readonly templates: ReadonlyMap<number, BeastTemplate>,
        /** Selection order for the rolled beast index. */
        readonly ids: readonly number[]
    ) {}

    static fromSeed(seed: CatalogSeed): BeastCatalog {
        const { templateIds, elements, images } = seed;
        if (templateIds.length !== elements.length || templateIds.length !== images.length) {
            throw new GachaError(
                'LENGTH_MISMATCH',
                `catalog lists differ in length: ${templateIds.length} ids, ${elements.length} elements, ${images.length} images`
            );
        }
        if (templateIds.length === 0) {
            throw new GachaError('EMPTY_CATALOG', 'catalog needs at least one template');
        }

        const templates = new Map<number, BeastTemplate>();
        templateIds.forEach((templateId, i) => {
            const code = elements[i];
            if (templateId === 0 || code === 0) {
                throw new GachaError('ZERO_VALUE', `entry ${i}: template id and element code must be non-zero`);
            }
            if (!Number.isInteger(templateId) || templateId < 0) {
                throw new GachaError('OUT_OF_BOUND', `entry ${i}: template id ${templateId} is not a positive integer`);
            }
            const element = elementFromCode(code);
            if (!element) {
                throw new GachaError('OUT_OF_BOUND', `entry ${i}: element code ${code} exceeds ${MAX_ELEMENT_CODE}`);
            }
            if (templates.has(templateId)) {
                throw new GachaError('DUPLICATE_TEMPLATE', `entry ${i}: template ${templateId} already defined`);
            }
            templates.set(templateId, Object.freeze({ templateId, element, image: images[i] }));
        });

        return new BeastCatalog(templates, Object.freeze([...templateIds]));
    }

    get size(): number {
        return this.ids.length;
    }

    get(templateId: number): BeastTemplate | undefined {
        return this.templates.get(templateId);
    }

    require(templateId: number): BeastTemplate {
        const template = this.templates.get(templateId);
        if (!template) throw new GachaError('UNKNOWN_TEMPLATE', `no template ${templateId} in catalog`);
        return template;
    }

    at(index: number): BeastTemplate {
        if (!Number.isInteger(index) || index < 0 || index >= this.ids.length) {
            throw new GachaError('OUT_OF_BOUND', `beast index ${index} outside 0..${this.ids.length - 1}`);
        }
        return this.require(this.ids[index]);
    }
}

export function parseCatalog(raw: unknown): BeastCatalog {
    return BeastCatalog.fromSeed(CatalogSeedSchema.parse(raw));
}

export function loadCatalogFile(path: string): BeastCatalog {
    return parseCatalog(JSON.parse(fs.readFileSync(path, 'utf8')));
}
