export type { BlobStore, RemoteBlob } from "./blobStore";
export type {
  CloudMergeService,
  CloudMergeServiceOptions,
  CloudSyncStatus,
  SyncSummary,
} from "./cloudMergeService";
export { createCloudMergeService } from "./cloudMergeService";
export { createSyncService } from "./syncService";
export type { SyncService } from "./syncService";
export { createAutoSyncScheduler } from "./autoSyncScheduler";
export { syncStateMachine } from "./stateMachine";
export type { SyncPhase } from "./stateMachine";
