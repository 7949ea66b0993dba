import Database from 'better-sqlite3';
import type { UnitOfWork } from '../types.js';

export type Db = Database.Database;

const SCHEMA = `
CREATE TABLE IF NOT EXISTS balances (
  account TEXT PRIMARY KEY,
  amount TEXT NOT NULL,
  updated_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS ledger_entries (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  account TEXT NOT NULL,
  type TEXT NOT NULL CHECK (type IN ('credit', 'pull', 'burn')),
  amount TEXT NOT NULL,
  memo TEXT,
  created_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS roll_states (
  user_id TEXT PRIMARY KEY,
  state TEXT NOT NULL CHECK (state IN ('idle', 'rolling')),
  updated_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS roll_requests (
  request_id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL UNIQUE,
  created_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS randomness_requests (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  request_id TEXT UNIQUE,
  requester TEXT NOT NULL,
  num_words INTEGER NOT NULL,
  status TEXT NOT NULL CHECK (status IN ('pending', 'fulfilled')),
  random_words TEXT,
  created_at INTEGER NOT NULL,
  fulfilled_at INTEGER
);

CREATE TABLE IF NOT EXISTS beasts (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  owner TEXT NOT NULL,
  template_id INTEGER NOT NULL,
  element TEXT NOT NULL CHECK (element IN ('fire', 'ice', 'nature', 'thunder')),
  rarity TEXT NOT NULL CHECK (rarity IN ('common', 'rare', 'unique', 'legendary')),
  hp INTEGER NOT NULL,
  attack INTEGER NOT NULL,
  defense INTEGER NOT NULL,
  request_id TEXT NOT NULL UNIQUE,
  created_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS beasts_owner ON beasts(owner);

CREATE TABLE IF NOT EXISTS treasury_movements (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  direction TEXT NOT NULL CHECK (direction IN ('in', 'out')),
  counterparty TEXT NOT NULL,
  amount TEXT NOT NULL,
  memo TEXT,
  created_at INTEGER NOT NULL
);
`;

export function openDatabase(path: string): Db {
    const db = new Database(path);
    if (path !== ':memory:') {
        db.pragma('journal_mode = WAL');
    }
    db.exec(SCHEMA);
    return db;
}

// Effects waiting on the outermost open transaction of each connection
const pendingEffects = new WeakMap<Db, Array<() => void>>();

// Nested calls become savepoints, so an inner failure can be caught without losing the outer work
export function transactional(db: Db): UnitOfWork {
    const run = <T>(fn: () => T): T => {
        const queue = pendingEffects.get(db);
        if (queue) {
            const mark = queue.length;
            try {
                return db.transaction(fn)();
            } catch (error) {
                queue.splice(mark);
                throw error;
            }
        }

        const effects: Array<() => void> = [];
        pendingEffects.set(db, effects);
        try {
            const result = db.transaction(fn)();
            pendingEffects.delete(db);
            for (const effect of effects) effect();
            return result;
        } finally {
            pendingEffects.delete(db);
        }
    };

    return Object.assign(run, {
        afterCommit(effect: () => void): void {
            const queue = pendingEffects.get(db);
            if (queue) queue.push(effect);
            else effect();
        }
    });
}
