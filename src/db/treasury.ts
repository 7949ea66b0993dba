import { GachaError } from '../errors.js';
import type { PaymentGateway, Treasury } from '../types.js';
import type { Db } from './index.js';

export type TreasuryMovement = {
    id: number;
    direction: 'in' | 'out';
    counterparty: string;
    amount: bigint;
    memo: string | null;
    createdAt: number;
};

type MovementRow = Omit<TreasuryMovement, 'amount'> & { amount: string };

// Payment asset held from purchases; send() is how refunds and withdrawals leave
export class SqliteTreasury implements Treasury, PaymentGateway {
    constructor(private readonly db: Db) {}

    receive(from: string, amount: bigint, memo: string): void {
        if (amount <= 0n) throw new GachaError('ZERO_AMOUNT', 'received amount must be positive');
        this.record('in', from, amount, memo);
    }

    send(to: string, amount: bigint, memo: string): boolean {
        if (amount <= 0n || this.balance() < amount) return false;
        this.record('out', to, amount, memo);
        return true;
    }

    balance(): bigint {
        return this.movements().reduce(
            (sum, m) => (m.direction === 'in' ? sum + m.amount : sum - m.amount),
            0n
        );
    }

    movements(): TreasuryMovement[] {
        return this.db
            .prepare<[], MovementRow>(
                `SELECT id, direction, counterparty, amount, memo, created_at as createdAt FROM treasury_movements ORDER BY id`
            )
            .all()
            .map((row) => ({ ...row, amount: BigInt(row.amount) }));
    }

    private record(direction: 'in' | 'out', counterparty: string, amount: bigint, memo: string): void {
        this.db.prepare(`INSERT INTO treasury_movements (direction, counterparty, amount, memo, created_at) VALUES (?, ?, ?, ?, ?)`)
            .run(direction, counterparty, amount.toString(), memo, Date.now());
    }
}
