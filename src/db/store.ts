/**
 * Adjustment Store
 *
 * The store operations the engine needs, and their PostgreSQL implementation.
 * Services only see the interfaces, so they can run against any store.
 */

import type { Pool } from 'pg';
import type { AppConfig } from '../core/config.js';
import type { Logger } from '../core/logger.js';
import { closePool, createPool, queryable, withTransaction, type Endpoint, type Queryable } from './client.js';
import { openTunnel, type Tunnel } from './tunnel.js';
import { findCheckpoints, getChildCheckpoints, getMapName } from './repositories/checkpoints.js';
import { findSegmentRuns, getFinalCheckpointTime } from './repositories/runs.js';
import { getStatistics, hasUpdatePrivilege, setTimePlayed } from './repositories/statistics.js';
import type { Checkpoint, CheckpointStatistic, SegmentRun } from './types.js';

export interface SegmentRunQuery {
  fromCpId: number;
  toCpId: number;
  mapid: number;
  maxSegmentTicks: number;
}

/**
 * Operations available both outside and inside a transaction
 */
export interface StoreSession {
  findCheckpoints(cpIds: number[]): Promise<Checkpoint[]>;
  getChildCheckpoints(cpId: number, mapid: number): Promise<number[]>;
  getMapName(mapid: number): Promise<string | null>;
  findSegmentRuns(query: SegmentRunQuery): Promise<SegmentRun[]>;
  getFinalCheckpointTime(runId: number, mapid: number): Promise<number | null>;
  getStatistics(runId: number, cpIds: number[]): Promise<CheckpointStatistic[]>;
  /** @returns number of rows updated */
  setTimePlayed(runId: number, cpId: number, timePlayed: number): Promise<number>;
  hasUpdatePrivilege(): Promise<boolean>;
}

export interface AdjustmentStore extends StoreSession {
  /**
   * Runs `fn` atomically: commits if it resolves, rolls back if it rejects
   */
  transaction<T>(fn: (tx: StoreSession) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

function session(db: Queryable, logger: Logger): StoreSession {
  return {
    findCheckpoints: (cpIds) => findCheckpoints(db, logger, cpIds),
    getChildCheckpoints: (cpId, mapid) => getChildCheckpoints(db, logger, cpId, mapid),
    getMapName: (mapid) => getMapName(db, logger, mapid),
    findSegmentRuns: (query) => findSegmentRuns(db, logger, query),
    getFinalCheckpointTime: (runId, mapid) => getFinalCheckpointTime(db, logger, runId, mapid),
    getStatistics: (runId, cpIds) => getStatistics(db, logger, runId, cpIds),
    setTimePlayed: (runId, cpId, timePlayed) => setTimePlayed(db, logger, runId, cpId, timePlayed),
    hasUpdatePrivilege: () => hasUpdatePrivilege(db, logger)
  };
}

/**
 * Connects to the configured database, through the SSH tunnel when one is set
 *
 * The returned store owns the pool and the tunnel; `close()` releases both.
 */
export async function openPgStore(cfg: AppConfig, logger: Logger): Promise<AdjustmentStore> {
  let tunnel: Tunnel | null = null;
  let endpoint: Endpoint = { host: cfg.database.host, port: cfg.database.port };

  if (cfg.ssh) {
    tunnel = await openTunnel(cfg.ssh, logger);
    endpoint = { host: '127.0.0.1', port: tunnel.localPort };
  }

  let pool: Pool;
  try {
    pool = await createPool(cfg.database, endpoint, logger);
  } catch (err) {
    // Don't leave the tunnel open if the database is unreachable through it
    if (tunnel) await tunnel.close();
    throw err;
  }

  const openTunnelRef = tunnel;
  return {
    ...session(queryable(pool), logger),
    transaction: (fn) => withTransaction(pool, logger, (client) => fn(session(client, logger))),
    close: async () => {
      try {
        await closePool(pool, logger);
      } finally {
        if (openTunnelRef) await openTunnelRef.close();
      }
    }
  };
}
