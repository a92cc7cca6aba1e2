// packages/core/src/sync/index.ts -- barrel re-export

export { SourceSync, inspectWorkingTree } from './source-sync.js';
export type { SourceSyncOptions, WorkingTreeState } from './source-sync.js';
