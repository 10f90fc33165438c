export { SqliteProvenanceStore } from "./sqlite.js";
export type { Migration, StoredRun, StoredAttempt, RunQuery, RunStatistics } from "./sqlite.js";
