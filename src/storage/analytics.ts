/**
 * Analytics Queries for Simulation Data
 * Trajectories and aggregates over recorded runs
 */

import type { SimulationDatabase, RunInfo } from './database.js';

// ============================================================================
// Types
// ============================================================================

/**
 * One social class at one snapshot
 */
export interface ClassTrajectoryPoint {
  tick: number;
  active: boolean;
  wealth: number;
  classConsciousness: number;
  nationalIdentity: number;
  agitation: number;
}

export interface TensionPoint {
  tick: number;
  aggregateTension: number;
  totalWealth: number;
  imperialRentPool: number;
}

export interface RunOverview {
  run: RunInfo;
  snapshotCount: number;
  eventCount: number;
  firstTick: number | null;
  lastTick: number | null;
  peakTension: number;
  finalWealth: number | null;
  eventsByType: Record<string, number>;
}

// ============================================================================
// Analytics Functions
// ============================================================================

/**
 * Event counts by type for a run
 */
export function getEventCounts(db: SimulationDatabase, runId: number): Record<string, number> {
  const rows = db
    .getDatabase()
    .prepare<[number], { event_type: string; count: number }>(
      'SELECT event_type, COUNT(*) as count FROM events WHERE run_id = ? GROUP BY event_type ORDER BY event_type'
    )
    .all(runId);

  return Object.fromEntries(rows.map((row) => [row.event_type, row.count]));
}

/**
 * Wealth and ideology of one class across a run's snapshots
 */
export function getClassTrajectory(db: SimulationDatabase, runId: number, entityId: string): ClassTrajectoryPoint[] {
  const rows = db
    .getDatabase()
    .prepare<
      [number, string],
      {
        tick: number;
        active: number;
        wealth: number;
        class_consciousness: number;
        national_identity: number;
        agitation: number;
      }
    >(
      `SELECT s.tick AS tick, m.active AS active, m.wealth AS wealth,
              m.class_consciousness AS class_consciousness,
              m.national_identity AS national_identity, m.agitation AS agitation
       FROM entity_metrics m JOIN snapshots s ON s.id = m.snapshot_id
       WHERE s.run_id = ? AND m.entity_id = ? AND m.kind = 'social_class'
       ORDER BY s.tick`
    )
    .all(runId, entityId);

  return rows.map((row) => ({
    tick: row.tick,
    active: row.active === 1,
    wealth: row.wealth,
    classConsciousness: row.class_consciousness,
    nationalIdentity: row.national_identity,
    agitation: row.agitation,
  }));
}

export function getTensionTrend(db: SimulationDatabase, runId: number): TensionPoint[] {
  return db.getSnapshots(runId).map((s) => ({
    tick: s.tick,
    aggregateTension: s.aggregateTension,
    totalWealth: s.totalWealth,
    imperialRentPool: s.imperialRentPool,
  }));
}

/**
 * Headline numbers for a run; null when the run does not exist
 */
export function getRunOverview(db: SimulationDatabase, runId: number): RunOverview | null {
  const run = db.getRun(runId);
  if (!run) return null;

  const snapshots = db.getSnapshots(runId);
  const eventsByType = getEventCounts(db, runId);
  const last = snapshots[snapshots.length - 1];

  return {
    run,
    snapshotCount: snapshots.length,
    eventCount: Object.values(eventsByType).reduce((sum, n) => sum + n, 0),
    firstTick: snapshots[0]?.tick ?? null,
    lastTick: last?.tick ?? null,
    peakTension: snapshots.reduce((peak, s) => Math.max(peak, s.aggregateTension), 0),
    finalWealth: last?.totalWealth ?? null,
    eventsByType,
  };
}
