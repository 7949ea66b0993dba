export const ELEMENTS = ['fire', 'ice', 'nature', 'thunder'] as const;
export type Element = (typeof ELEMENTS)[number];

export const RARITIES = ['common', 'rare', 'unique', 'legendary'] as const;
export type Rarity = (typeof RARITIES)[number];

export type RollState = 'idle' | 'rolling';

export type BeastTemplate = {
    templateId: number; // > 0
    element: Element;
    image: string;
};

export type MintedAttributes = {
    templateId: number;
    rarity: Rarity;
    hp: number;
    attack: number;
    defense: number;
    element: Element;
};

export type Beast = MintedAttributes & {
    id: number;
    owner: string;
    requestId: string;
    createdAt: number;
};

export type RollRequest = {
    requestId: string;
    user: string;
    createdAt: number;
};

export type RollTicket = {
    requestId: string;
    user: string;
    price: bigint;
};

export type FulfilledRoll = {
    requestId: string;
    user: string;
    beastId: number;
    attributes: MintedAttributes;
};

export type PurchaseReceipt = {
    user: string;
    amount: bigint; // token base units credited
    paid: bigint; // asset base units kept
    refund: bigint; // asset base units returned
};

export type PriceRound = {
    answer: bigint; // 8-decimal USD per asset unit
    updatedAt: number; // unix seconds
};

// Seed data for the catalog, as parallel lists
export type CatalogSeed = {
    templateIds: number[];
    elements: number[]; // 1..4, 0 = none
    images: string[];
};

// Runs fn as one all-or-nothing unit; a throw discards every write made inside it
export type UnitOfWork = {
    <T>(fn: () => T): T;
    /** Queues an effect until the outermost unit commits; dropped if its unit rolls back. */
    afterCommit(effect: () => void): void;
};

export type RandomnessRequestParams = {
    requester: string;
    numWords: number;
};

export interface TokenLedger {
    balanceOf(account: string): bigint;
    /** Moves `amount` from `user` into the engine's custody. */
    pull(user: string, amount: bigint): boolean;
    /** Destroys `amount` held in the engine's custody. */
    burn(amount: bigint): void;
}

export interface RandomnessProvider {
    readonly id: string;
    request(params: RandomnessRequestParams): string;
}

export interface RandomnessConsumer {
    onRandomnessFulfilled(caller: string, requestId: string, randomWords: readonly bigint[]): FulfilledRoll | null;
}

export interface NFTRegistry {
    mint(caller: string, to: string, attributes: MintedAttributes, requestId: string): number;
}

export interface PriceFeed {
    latestPrice(): Promise<PriceRound>;
}

export interface Treasury {
    receive(from: string, amount: bigint, memo: string): void;
    balance(): bigint;
}

export interface PaymentGateway {
    send(to: string, amount: bigint, memo: string): boolean;
}

export interface RollStore {
    stateOf(user: string): RollState;
    setState(user: string, state: RollState): void;
    recordRequest(requestId: string, user: string): void;
    findRequest(requestId: string): RollRequest | undefined;
    requestOf(user: string): RollRequest | undefined;
    deleteRequest(requestId: string): void;
}
