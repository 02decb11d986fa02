/**
 * Storage Module
 * SQLite database storage and analytics for simulation data
 */

export { SimulationDatabase, SqliteCheckpointSink, createDatabase } from './database.js';
export type { RunInfo, SnapshotRow, StoredEvent, DatabaseStats } from './database.js';

export { getEventCounts, getClassTrajectory, getTensionTrend, getRunOverview } from './analytics.js';

export type { ClassTrajectoryPoint, TensionPoint, RunOverview } from './analytics.js';
