/**
 * Database Entity Types
 *
 * TypeScript interfaces matching the columns the tool reads.
 * pg hands back BIGINT and NUMERIC columns as strings, hence the unions.
 */

type DbNumber = number | string;

export interface CheckpointRow {
  cp_id: DbNumber;
  mapid: DbNumber;
}

export interface CheckpointConnectionRow {
  child_cp_id: DbNumber;
}

export interface MapRow {
  mapname: string;
}

export interface SegmentRunRow {
  run_id: DbNumber;
  start_time: DbNumber;
  end_time: DbNumber;
  mapid: DbNumber;
  playername: string;
  player_id: DbNumber;
  fps: DbNumber;
}

export interface CheckpointStatisticRow {
  cp_id: DbNumber;
  time_played: DbNumber;
}

/**
 * Domain shapes handed out by the store, with numbers already parsed
 */

export interface Checkpoint {
  cpId: number;
  mapid: number;
}

export interface SegmentRun {
  runId: number;
  startTime: number; // time_played at the from checkpoint
  endTime: number; // time_played at the to checkpoint
  mapid: number;
  playerId: number;
  playerName: string;
  fps: number;
}

export interface CheckpointStatistic {
  runId: number;
  cpId: number;
  timePlayed: number;
}
