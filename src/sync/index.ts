export { computeDelta } from "./delta";
export { runSync, syncFeed } from "./orchestrator";
export { createSyncRunner } from "./run";
export type { FeedSyncResult, Publisher, SyncDeps, SyncReport } from "./orchestrator";
export type { SyncRunner, SyncRunnerDeps } from "./run";
