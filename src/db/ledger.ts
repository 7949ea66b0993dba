import { GachaError } from '../errors.js';
import type { TokenLedger } from '../types.js';
import type { Db } from './index.js';

export type LedgerEntryType = 'credit' | 'pull' | 'burn';

export type LedgerEntry = {
    id: number;
    account: string;
    type: LedgerEntryType;
    amount: bigint;
    memo: string | null;
    createdAt: number;
};

type LedgerEntryRow = Omit<LedgerEntry, 'amount'> & { amount: string };

/**
 * Summon token balances. `custodian` is the account pulled payments land in
 * and the only one burn() draws from.
 */
export class SqliteTokenLedger implements TokenLedger {
    constructor(private readonly db: Db, readonly custodian: string) {}

    balanceOf(account: string): bigint {
        const row = this.db
            .prepare<[string], { amount: string }>(`SELECT amount FROM balances WHERE account = ?`)
            .get(account);
        return row ? BigInt(row.amount) : 0n;
    }

    totalSupply(): bigint {
        const rows = this.db.prepare<[], { amount: string }>(`SELECT amount FROM balances`).all();
        return rows.reduce((sum, row) => sum + BigInt(row.amount), 0n);
    }

    credit(account: string, amount: bigint, memo: string): void {
        if (amount <= 0n) throw new GachaError('ZERO_AMOUNT', 'credit amount must be positive');
        this.setBalance(account, this.balanceOf(account) + amount);
        this.record(account, 'credit', amount, memo);
    }

    pull(user: string, amount: bigint): boolean {
        const balance = this.balanceOf(user);
        if (amount <= 0n || balance < amount) return false;
        this.setBalance(user, balance - amount);
        this.setBalance(this.custodian, this.balanceOf(this.custodian) + amount);
        this.record(user, 'pull', amount, `to ${this.custodian}`);
        return true;
    }

    burn(amount: bigint): void {
        const held = this.balanceOf(this.custodian);
        if (amount <= 0n || held < amount) {
            throw new GachaError('TRANSFER_FAILED', `custody holds ${held}, cannot burn ${amount}`);
        }
        this.setBalance(this.custodian, held - amount);
        this.record(this.custodian, 'burn', amount, null);
    }

    entries(account: string, limit = 20): LedgerEntry[] {
        return this.db
            .prepare<[string, number], LedgerEntryRow>(
                `SELECT id, account, type, amount, memo, created_at as createdAt
                   FROM ledger_entries WHERE account = ? ORDER BY id DESC LIMIT ?`
            )
            .all(account, limit)
            .map((row) => ({ ...row, amount: BigInt(row.amount) }));
    }

    private setBalance(account: string, amount: bigint): void {
        this.db.prepare(`INSERT INTO balances (account, amount, updated_at) VALUES (?, ?, ?)
              ON CONFLICT(account) DO UPDATE SET amount=excluded.amount, updated_at=excluded.updated_at`)
            .run(account, amount.toString(), Date.now());
    }

    private record(account: string, type: LedgerEntryType, amount: bigint, memo: string | null): void {
        this.db.prepare(`INSERT INTO ledger_entries (account, type, amount, memo, created_at) VALUES (?, ?, ?, ?, ?)`)
            .run(account, type, amount.toString(), memo, Date.now());
    }
}
