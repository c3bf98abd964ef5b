import Database from 'better-sqlite3';
import config from 'config';
import fs from 'node:fs';
import path from 'node:path';
import logger from './logger.js';
import type { StateChannel } from './stateChannel.js';
import type { ChannelMessage, MotionEvent, MotionRegion } from './types.js';

type MotionEventRow = {
  id: number;
  ts: number;
  sequence: number;
  deviceIndex: number | null;
  regionCount: number;
  largestArea: number | null;
  regions: string;
  snapshotPath: string | null;
};

export type StoredMotionEvent = {
  id: number;
  ts: number;
  sequence: number;
  deviceIndex: number | null;
  regions: MotionRegion[];
  snapshotPath: string | null;
};

export interface ListMotionEventsOptions {
  limit?: number;
  offset?: number;
  since?: number;
  until?: number;
}

export interface PaginatedMotionEvents {
  items: StoredMotionEvent[];
  total: number;
}

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 500;

export class MotionEventStore {
  readonly path: string;
  private readonly db: Database.Database;
  private readonly insertStatement: Database.Statement<
    [{ ts: number; sequence: number; deviceIndex: number | null; regionCount: number; largestArea: number | null; regions: string }]
  >;
  private readonly snapshotStatement: Database.Statement<[{ id: number; snapshotPath: string }]>;
  private readonly pruneStatement: Database.Statement<[{ cutoff: number }]>;

  constructor(dbPath: string = config.get<string>('database.path')) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    this.path = dbPath === ':memory:' ? dbPath : path.resolve(dbPath);
    this.db = new Database(dbPath);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS motion_events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        ts INTEGER NOT NULL,
        sequence INTEGER NOT NULL,
        device_index INTEGER,
        region_count INTEGER NOT NULL,
        largest_area INTEGER,
        regions TEXT NOT NULL,
        snapshot_path TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_motion_events_ts ON motion_events (ts);
    `);

    this.insertStatement = this.db.prepare(`
      INSERT INTO motion_events (ts, sequence, device_index, region_count, largest_area, regions)
      VALUES (@ts, @sequence, @deviceIndex, @regionCount, @largestArea, @regions)
    `);
    this.snapshotStatement = this.db.prepare(
      'UPDATE motion_events SET snapshot_path = @snapshotPath WHERE id = @id'
    );
    this.pruneStatement = this.db.prepare('DELETE FROM motion_events WHERE ts < @cutoff');
  }

  storeMotionEvent(event: MotionEvent, deviceIndex: number | null = null): number {
    const result = this.insertStatement.run({
      ts: event.ts,
      sequence: event.sequence,
      deviceIndex,
      regionCount: event.regions.length,
      largestArea: event.regions[0]?.area ?? null,
      regions: JSON.stringify(event.regions)
    });
    return Number(result.lastInsertRowid);
  }

  setSnapshotPath(id: number, snapshotPath: string): boolean {
    return this.snapshotStatement.run({ id, snapshotPath }).changes > 0;
  }

  listMotionEvents(options: ListMotionEventsOptions = {}): PaginatedMotionEvents {
    const filters: string[] = [];
    const params: Record<string, number> = {};

    if (typeof options.since === 'number') {
      filters.push('ts >= @since');
      params.since = options.since;
    }

    if (typeof options.until === 'number') {
      filters.push('ts <= @until');
      params.until = options.until;
    }

    const whereClause = filters.length > 0 ? `WHERE ${filters.join(' AND ')}` : '';
    const limit = clampLimit(options.limit);
    const offset = clampOffset(options.offset);

    const rows = this.db
      .prepare<[Record<string, number>], MotionEventRow>(
        `
        SELECT id, ts, sequence, device_index AS deviceIndex, region_count AS regionCount,
               largest_area AS largestArea, regions, snapshot_path AS snapshotPath
        FROM motion_events
        ${whereClause}
        ORDER BY ts DESC, id DESC
        LIMIT @limit OFFSET @offset
      `
      )
      .all({ ...params, limit, offset });
    const totalRow = this.db
      .prepare<[Record<string, number>], { count: number }>(
        `SELECT COUNT(*) AS count FROM motion_events ${whereClause}`
      )
      .get(params);

    return {
      items: rows.map(mapRow),
      total: totalRow?.count ?? 0
    };
  }

  pruneEventsOlderThan(cutoffTs: number): number {
    return this.pruneStatement.run({ cutoff: cutoffTs }).changes;
  }

  clear() {
    this.db.prepare('DELETE FROM motion_events').run();
  }

  close() {
    if (this.db.open) {
      this.db.close();
    }
  }
}

function mapRow(row: MotionEventRow): StoredMotionEvent {
  return {
    id: row.id,
    ts: row.ts,
    sequence: row.sequence,
    deviceIndex: row.deviceIndex,
    regions: parseRegions(row.regions),
    snapshotPath: row.snapshotPath
  };
}

function parseRegions(raw: string): MotionRegion[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return [];
  }
  if (!Array.isArray(parsed)) {
    return [];
  }
  return parsed.filter(isRegion);
}

function isRegion(value: unknown): value is MotionRegion {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return ['x', 'y', 'width', 'height', 'area'].every(
    key => key in value && typeof Reflect.get(value, key) === 'number'
  );
}

function clampLimit(limit: number | undefined) {
  if (typeof limit !== 'number' || !Number.isFinite(limit)) {
    return DEFAULT_LIMIT;
  }
  return Math.min(MAX_LIMIT, Math.max(1, Math.floor(limit)));
}

function clampOffset(offset: number | undefined) {
  if (typeof offset !== 'number' || !Number.isFinite(offset)) {
    return 0;
  }
  return Math.max(0, Math.floor(offset));
}

export interface EventRecorder {
  /** Recorded events whose snapshot write has not reported back yet. */
  readonly pendingSnapshots: number;
  stop(): Promise<void>;
}

/**
 * Persists every motion event published on the channel and attaches snapshot paths as their
 * `snapshot-saved` notices arrive.
 */
export function startEventRecorder(
  channel: StateChannel,
  store: MotionEventStore,
  options: { deviceIndex?: () => number } = {}
): EventRecorder {
  const subscription = channel.subscribe();
  const idsBySequence = new Map<number, number>();

  const record = (message: ChannelMessage) => {
    try {
      if (message.type === 'motion') {
        if (message.event.sequence === 1) {
          idsBySequence.clear();
        }
        const id = store.storeMotionEvent(message.event, options.deviceIndex?.() ?? null);
        if (message.event.snapshot) {
          idsBySequence.set(message.event.sequence, id);
        }
      } else if (message.type === 'notice') {
        const { code, details } = message.notice;
        const sequence = details?.sequence;
        if ((code !== 'snapshot-saved' && code !== 'io-error') || typeof sequence !== 'number') {
          return;
        }
        const id = idsBySequence.get(sequence);
        idsBySequence.delete(sequence);
        const snapshotPath = details?.path;
        if (code === 'snapshot-saved' && id !== undefined && typeof snapshotPath === 'string') {
          store.setSnapshotPath(id, snapshotPath);
        }
      }
    } catch (error) {
      logger.error({ err: error }, 'Failed to record motion event');
    }
  };

  const done = (async () => {
    for await (const message of subscription) {
      record(message);
    }
  })();

  return {
    get pendingSnapshots() {
      return idsBySequence.size;
    },
    async stop() {
      subscription.finish();
      await done;
    }
  };
}
