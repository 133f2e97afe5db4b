/**
 * Barrel exports for the persistence layer.
 */

export { DatabaseWrapper, DatabaseServiceImpl, createDatabaseService, IN_MEMORY_DATABASE } from './database.js'
export type { DatabaseService } from './database.js'
export { runMigrations, MIGRATIONS } from './migrations/index.js'
export type { Migration } from './migrations/index.js'
export { createRun, getRun, updateRun, listRuns } from './queries/runs.js'
export type { RunRow, CreateRunInput, UpdateRunInput } from './queries/runs.js'
export { insertIteration, listIterations, toIterationRecord } from './queries/iterations.js'
export type { IterationRow } from './queries/iterations.js'
export { SqliteIterationRecorder, createSqliteIterationRecorder } from './iteration-recorder.js'
