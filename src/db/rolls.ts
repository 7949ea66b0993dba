import type { RollRequest, RollState, RollStore } from '../types.js';
import type { Db } from './index.js';

// user -> state and request id -> user, the engine's two keyed stores
export class SqliteRollStore implements RollStore {
    constructor(private readonly db: Db) {}

    stateOf(user: string): RollState {
        const row = this.db
            .prepare<[string], { state: RollState }>(`SELECT state FROM roll_states WHERE user_id = ?`)
            .get(user);
        return row?.state ?? 'idle';
    }

    setState(user: string, state: RollState): void {
        this.db.prepare(`INSERT INTO roll_states (user_id, state, updated_at) VALUES (?, ?, ?)
              ON CONFLICT(user_id) DO UPDATE SET state=excluded.state, updated_at=excluded.updated_at`)
            .run(user, state, Date.now());
    }

    recordRequest(requestId: string, user: string): void {
        this.db.prepare(`INSERT INTO roll_requests (request_id, user_id, created_at) VALUES (?, ?, ?)`)
            .run(requestId, user, Date.now());
    }

    findRequest(requestId: string): RollRequest | undefined {
        return this.db
            .prepare<[string], RollRequest>(
                `SELECT request_id as requestId, user_id as user, created_at as createdAt FROM roll_requests WHERE request_id = ?`
            )
            .get(requestId);
    }

    requestOf(user: string): RollRequest | undefined {
        return this.db
            .prepare<[string], RollRequest>(
                `SELECT request_id as requestId, user_id as user, created_at as createdAt FROM roll_requests WHERE user_id = ?`
            )
            .get(user);
    }

    deleteRequest(requestId: string): void {
        this.db.prepare(`DELETE FROM roll_requests WHERE request_id = ?`).run(requestId);
    }
}
