import { GachaError } from '../errors.js';
import type { PaymentGateway, PurchaseReceipt, Treasury, UnitOfWork } from '../types.js';
import type { GachaEvents } from './events.js';
import type { PricingOracleAdapter } from './pricing.js';

export type TokenMinter = {
    credit(account: string, amount: bigint, memo: string): void;
};

export type TokenShopOptions = {
    owner: string;
    pricing: PricingOracleAdapter;
    tokens: TokenMinter;
    treasury: Treasury;
    gateway: PaymentGateway;
    atomic: UnitOfWork;
    events: GachaEvents;
};

export class TokenShop {
    private readonly options: TokenShopOptions;

    constructor(options: TokenShopOptions) {
        this.options = options;
    }

    quote(amount: bigint): Promise<bigint> {
        return this.options.pricing.quote(amount);
    }

    async purchase(buyer: string, amount: bigint, payment: bigint): Promise<PurchaseReceipt> {
        const required = await this.options.pricing.quote(amount);
        if (payment < required) {
            throw new GachaError('UNDERPAID', `payment ${payment} is below the required ${required}`);
        }
        const refund = payment - required;
        const { treasury, tokens, gateway, atomic, events } = this.options;

        return atomic((): PurchaseReceipt => {
            treasury.receive(buyer, payment, `purchase of ${amount}`);
            tokens.credit(buyer, amount, 'purchase');
            // A lost refund voids the whole purchase
            if (refund > 0n && !gateway.send(buyer, refund, 'purchase refund')) {
                throw new GachaError('REFUND_FAILED', `could not refund ${refund} to ${buyer}`);
            }
            atomic.afterCommit(() => events.emit('tokenPurchased', { user: buyer, amount }));
            return { user: buyer, amount, paid: required, refund };
        });
    }

    // Value only enters through purchase()
    receiveDirectPayment(from: string, value: bigint | string): never {
        throw new GachaError('DIRECT_PAYMENT_REJECTED', `direct payment of ${value} from ${from} rejected; use purchase`);
    }

    withdraw(caller: string, to: string): bigint {
        const { owner, treasury, gateway, atomic } = this.options;
        if (caller !== owner) throw new GachaError('UNAUTHORIZED', `${caller} is not the owner`);
        return atomic(() => {
            const balance = treasury.balance();
            if (balance === 0n) throw new GachaError('ZERO_AMOUNT', 'treasury is empty');
            if (!gateway.send(to, balance, 'withdrawal')) {
                throw new GachaError('TRANSFER_FAILED', `could not send ${balance} to ${to}`);
            }
            return balance;
        });
    }
}
