import { randomWord } from '../core/rng.js';
import type { RandomnessConsumer, RandomnessProvider, RandomnessRequestParams } from '../types.js';
import { transactional, type Db } from './index.js';

export type RandomnessStatus = 'pending' | 'fulfilled';

export type RandomnessRecord = {
    requestId: string;
    requester: string;
    numWords: number;
    status: RandomnessStatus;
    randomWords: bigint[];
    createdAt: number;
    fulfilledAt: number | null;
};

type RandomnessRow = Omit<RandomnessRecord, 'randomWords'> & { randomWords: string | null };

export type DeliveryReport = {
    delivered: string[];
    failed: { requestId: string; error: unknown }[];
};

export type CoordinatorOptions = {
    id: string;
    secret: string;
    // Injected in tests for reproducible words
    drawWord?: () => bigint;
};

const SELECT_RECORD = `SELECT request_id as requestId, requester, num_words as numWords, status,
       random_words as randomWords, created_at as createdAt, fulfilled_at as fulfilledAt
  FROM randomness_requests`;

function toRecord(row: RandomnessRow): RandomnessRecord {
    const words: string[] = row.randomWords ? JSON.parse(row.randomWords) : [];
    return { ...row, randomWords: words.map((w) => BigInt(w)) };
}

/**
 * In-process randomness coordinator. request() only queues; words are drawn
 * and handed to the consumer later by deliverPending(), one delivery per id.
 */
export class LocalRandomnessCoordinator implements RandomnessProvider {
    readonly id: string;
    private readonly drawWord: () => bigint;

    constructor(private readonly db: Db, options: CoordinatorOptions) {
        this.id = options.id;
        this.drawWord = options.drawWord ?? (() => randomWord(options.secret));
    }

    request(params: RandomnessRequestParams): string {
        const numWords = Math.max(1, Math.floor(params.numWords));
        const { lastInsertRowid } = this.db
            .prepare(`INSERT INTO randomness_requests (requester, num_words, status, created_at) VALUES (?, ?, 'pending', ?)`)
            .run(params.requester, numWords, Date.now());
        const requestId = `vrf-${lastInsertRowid}`;
        this.db.prepare(`UPDATE randomness_requests SET request_id = ? WHERE seq = ?`).run(requestId, lastInsertRowid);
        return requestId;
    }

    get(requestId: string): RandomnessRecord | undefined {
        const row = this.db.prepare<[string], RandomnessRow>(`${SELECT_RECORD} WHERE request_id = ?`).get(requestId);
        return row ? toRecord(row) : undefined;
    }

    pending(): RandomnessRecord[] {
        return this.db
            .prepare<[], RandomnessRow>(`${SELECT_RECORD} WHERE status = 'pending' ORDER BY seq`)
            .all()
            .map(toRecord);
    }

    /**
     * Delivers every pending request. Marking a request fulfilled and the
     * consumer callback share one transaction: if the consumer throws, the
     * request stays pending for the next run. Effects the consumer queues
     * with afterCommit run once that transaction has committed.
     */
    deliverPending(consumer: RandomnessConsumer): DeliveryReport {
        const report: DeliveryReport = { delivered: [], failed: [] };
        for (const request of this.pending()) {
            const words = Array.from({ length: request.numWords }, () => this.drawWord());
            try {
                transactional(this.db)(() => {
                    this.db.prepare(`UPDATE randomness_requests SET status = 'fulfilled', random_words = ?, fulfilled_at = ? WHERE request_id = ?`)
                        .run(JSON.stringify(words.map((w) => w.toString())), Date.now(), request.requestId);
                    consumer.onRandomnessFulfilled(this.id, request.requestId, words);
                });
                report.delivered.push(request.requestId);
            } catch (error) {
                console.error(`Delivery of ${request.requestId} failed:`, error);
                report.failed.push({ requestId: request.requestId, error });
            }
        }
        return report;
    }
}
