import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { openDatabase, type Db } from '../src/db/index.js';
import { LocalRandomnessCoordinator } from '../src/db/randomness.js';
import type { RandomnessConsumer } from '../src/types.js';
import { COORDINATOR, sequentialWords } from './helpers.js';

type Call = { caller: string; requestId: string; words: readonly bigint[] };

function recordingConsumer(calls: Call[]): RandomnessConsumer {
    return {
        onRandomnessFulfilled(caller, requestId, words) {
            calls.push({ caller, requestId, words });
            return null;
        }
    };
}

describe('LocalRandomnessCoordinator', () => {
    let db: Db;
    let coordinator: LocalRandomnessCoordinator;

    beforeEach(() => {
        db = openDatabase(':memory:');
        coordinator = new LocalRandomnessCoordinator(db, { id: COORDINATOR, secret: 'test-secret', drawWord: sequentialWords(10n) });
    });

    afterEach(() => {
        vi.restoreAllMocks();
        db.close();
    });

    it('issues fresh request ids and queues them', () => {
        expect(coordinator.request({ requester: 'engine', numWords: 1 })).toBe('vrf-1');
        expect(coordinator.request({ requester: 'engine', numWords: 2 })).toBe('vrf-2');
        expect(coordinator.pending().map((r) => [r.requestId, r.numWords, r.status])).toEqual([
            ['vrf-1', 1, 'pending'],
            ['vrf-2', 2, 'pending']
        ]);
        expect(coordinator.get('vrf-1')?.randomWords).toEqual([]);
    });

    it('delivers each request once with the requested number of words', () => {
        coordinator.request({ requester: 'engine', numWords: 1 });
        coordinator.request({ requester: 'engine', numWords: 3 });
        const calls: Call[] = [];

        expect(coordinator.deliverPending(recordingConsumer(calls))).toEqual({ delivered: ['vrf-1', 'vrf-2'], failed: [] });
        expect(calls).toEqual([
            { caller: COORDINATOR, requestId: 'vrf-1', words: [10n] },
            { caller: COORDINATOR, requestId: 'vrf-2', words: [20n, 30n, 40n] }
        ]);
        expect(coordinator.get('vrf-2')?.status).toBe('fulfilled');
        expect(coordinator.get('vrf-2')?.randomWords).toEqual([20n, 30n, 40n]);

        expect(coordinator.deliverPending(recordingConsumer(calls)).delivered).toEqual([]);
        expect(calls).toHaveLength(2);
    });

    it('keeps a request pending when the consumer throws', () => {
        vi.spyOn(console, 'error').mockImplementation(() => {});
        coordinator.request({ requester: 'engine', numWords: 1 });
        coordinator.request({ requester: 'engine', numWords: 1 });
        const calls: Call[] = [];
        const flaky: RandomnessConsumer = {
            onRandomnessFulfilled(caller, requestId, words) {
                if (requestId === 'vrf-1') throw new Error('consumer busy');
                calls.push({ caller, requestId, words });
                return null;
            }
        };

        const report = coordinator.deliverPending(flaky);

        expect(report.delivered).toEqual(['vrf-2']);
        expect(report.failed.map((f) => f.requestId)).toEqual(['vrf-1']);
        expect(coordinator.get('vrf-1')?.status).toBe('pending');
        expect(coordinator.get('vrf-1')?.fulfilledAt).toBeNull();
        expect(coordinator.pending().map((r) => r.requestId)).toEqual(['vrf-1']);
    });

    it('draws hmac-mixed 256-bit words by default', () => {
        const live = new LocalRandomnessCoordinator(db, { id: COORDINATOR, secret: 'test-secret' });
        live.request({ requester: 'engine', numWords: 2 });
        const calls: Call[] = [];
        live.deliverPending(recordingConsumer(calls));

        const [first, second] = calls[0].words;
        expect(first).toBeGreaterThanOrEqual(0n);
        expect(first).toBeLessThan(2n ** 256n);
        expect(first).not.toBe(second);
    });
});
