import { GachaError } from '../errors.js';
import type {
    FulfilledRoll,
    NFTRegistry,
    RandomnessConsumer,
    RandomnessProvider,
    RollRequest,
    RollState,
    RollStore,
    RollTicket,
    TokenLedger,
    UnitOfWork
} from '../types.js';
import type { BeastCatalog } from './catalog.js';
import { deriveAttributes } from './derivation.js';
import type { GachaEvents } from './events.js';

export type GachaEngineOptions = {
    identity: string;
    rollPrice: bigint;
    numWords?: number;
    catalog: BeastCatalog;
    ledger: TokenLedger;
    randomness: RandomnessProvider;
    registry: NFTRegistry;
    rolls: RollStore;
    atomic: UnitOfWork;
    events: GachaEvents;
};

/**
 * Burn-to-summon roll state machine.
 *
 * A roll is paid for and burned before randomness is requested, so a roll
 * that never gets fulfilled keeps the user in `rolling` with the payment
 * gone; there is no timeout or cancel path for it.
 */
export class GachaEngine implements RandomnessConsumer {
    readonly identity: string;
    readonly rollPrice: bigint;
    private readonly numWords: number;
    private readonly catalog: BeastCatalog;
    private readonly ledger: TokenLedger;
    private readonly randomness: RandomnessProvider;
    private readonly registry: NFTRegistry;
    private readonly rolls: RollStore;
    private readonly atomic: UnitOfWork;
    private readonly events: GachaEvents;

    constructor(options: GachaEngineOptions) {
        if (options.rollPrice <= 0n) {
            throw new GachaError('ZERO_AMOUNT', 'roll price must be positive');
        }
        this.identity = options.identity;
        this.rollPrice = options.rollPrice;
        this.numWords = Math.max(1, options.numWords ?? 1);
        this.catalog = options.catalog;
        this.ledger = options.ledger;
        this.randomness = options.randomness;
        this.registry = options.registry;
        this.rolls = options.rolls;
        this.atomic = options.atomic;
        this.events = options.events;
    }

    rollStateOf(user: string): RollState {
        return this.rolls.stateOf(user);
    }

    pendingRequestOf(user: string): RollRequest | undefined {
        return this.rolls.requestOf(user);
    }

    initiateRoll(user: string): RollTicket {
        return this.atomic((): RollTicket => {
            if (this.rolls.stateOf(user) !== 'idle') {
                throw new GachaError('ROLL_NOT_IDLE', `user ${user} already has a roll in progress`);
            }
            const balance = this.ledger.balanceOf(user);
            if (balance < this.rollPrice) {
                throw new GachaError('INSUFFICIENT_FUNDS', `balance ${balance} is below roll price ${this.rollPrice}`);
            }

            // Order matters: payment is gone before the outcome can exist
            if (!this.ledger.pull(user, this.rollPrice)) {
                throw new GachaError('TRANSFER_FAILED', `could not pull ${this.rollPrice} from ${user}`);
            }
            this.ledger.burn(this.rollPrice);
            const requestId = this.randomness.request({ requester: this.identity, numWords: this.numWords });
            this.rolls.setState(user, 'rolling');
            this.rolls.recordRequest(requestId, user);
            this.atomic.afterCommit(() => this.events.emit('rollStarted', { requestId, user }));

            return { requestId, user, price: this.rollPrice };
        });
    }

    /**
     * Randomness callback. Returns null for a request id that is unknown or
     * already consumed; such a call never mints.
     */
    onRandomnessFulfilled(caller: string, requestId: string, randomWords: readonly bigint[]): FulfilledRoll | null {
        if (caller !== this.randomness.id) {
            throw new GachaError('UNAUTHORIZED', `${caller} is not the randomness provider`);
        }
        if (randomWords.length === 0) {
            throw new GachaError('EMPTY_RANDOMNESS', `fulfilment for ${requestId} carried no random words`);
        }
        const [word] = randomWords;

        const fulfilled = this.atomic((): FulfilledRoll | null => {
            const request = this.rolls.findRequest(requestId);
            if (!request) return null;

            const attributes = deriveAttributes(this.catalog, word, requestId);

            // Settle our own bookkeeping before handing control to the registry
            this.rolls.setState(request.user, 'idle');
            this.rolls.deleteRequest(requestId);

            const beastId = this.registry.mint(this.identity, request.user, attributes, requestId);
            this.atomic.afterCommit(() => this.events.emit('rollFulfilled', { requestId, user: request.user, beastId }));
            return { requestId, user: request.user, beastId, attributes };
        });

        if (!fulfilled) {
            console.warn(`ignoring fulfilment for unknown request ${requestId}`);
            return null;
        }
        return fulfilled;
    }
}
