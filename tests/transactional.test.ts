import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { openDatabase, transactional, type Db } from '../src/db/index.js';
import type { UnitOfWork } from '../src/types.js';

describe('transactional', () => {
    let db: Db;
    let atomic: UnitOfWork;
    let log: string[];

    beforeEach(() => {
        db = openDatabase(':memory:');
        atomic = transactional(db);
        log = [];
    });

    afterEach(() => {
        db.close();
    });

    function write(account: string): void {
        db.prepare(`INSERT INTO balances (account, amount, updated_at) VALUES (?, '1', 0)`).run(account);
    }

    function count(): number {
        const row = db.prepare<[], { total: number }>(`SELECT COUNT(*) as total FROM balances`).get();
        return row?.total ?? 0;
    }

    it('runs an effect straight away outside a unit of work', () => {
        atomic.afterCommit(() => log.push('now'));
        expect(log).toEqual(['now']);
    });

    it('holds effects until the outermost unit commits', () => {
        const result = atomic(() => {
            atomic.afterCommit(() => log.push(`outer:${db.inTransaction}`));
            atomic(() => {
                write('alice');
                atomic.afterCommit(() => log.push(`inner:${db.inTransaction}`));
            });
            expect(log).toEqual([]);
            return 'done';
        });

        expect(result).toBe('done');
        expect(log).toEqual(['outer:false', 'inner:false']);
        expect(count()).toBe(1);
    });

    it('shares the queue between units opened on the same connection', () => {
        const other = transactional(db);
        atomic(() => {
            other(() => other.afterCommit(() => log.push(`other:${db.inTransaction}`)));
        });
        expect(log).toEqual(['other:false']);
    });

    it('drops the effects of a nested unit that rolls back', () => {
        atomic(() => {
            write('alice');
            atomic.afterCommit(() => log.push('kept'));
            try {
                atomic(() => {
                    write('bob');
                    atomic.afterCommit(() => log.push('dropped'));
                    throw new Error('inner failure');
                });
            } catch (error) {
                log.push(error instanceof Error ? error.message : 'unknown');
            }
        });

        expect(log).toEqual(['inner failure', 'kept']);
        expect(count()).toBe(1);
    });

    it('runs nothing when the outermost unit rolls back', () => {
        expect(() =>
            atomic(() => {
                write('alice');
                atomic.afterCommit(() => log.push('never'));
                throw new Error('outer failure');
            })
        ).toThrow('outer failure');

        expect(log).toEqual([]);
        expect(count()).toBe(0);
        expect(() => atomic(() => atomic.afterCommit(() => log.push('after')))).not.toThrow();
        expect(log).toEqual(['after']);
    });
});
