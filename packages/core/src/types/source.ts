// packages/core/src/types/source.ts — Source synchronization types

export interface SourceReference {
  /** Remote repository URL */
  url: string;
  /** Local working tree path */
  path: string;
  /** Branch, tag or commit to check out */
  ref: string;
  /** Shallow fetch depth; undefined fetches full history */
  depth?: number;
  /** Parallel fetch jobs passed to git */
  jobs: number;
  /** Tag placed on the synced commit; undefined skips tagging */
  diffbaseTag?: string;
}

export type SyncAction = 'cloned' | 'updated' | 'unchanged';

export interface SyncResult {
  path: string;
  ref: string;
  /** Commit hash HEAD points at after the sync */
  revision: string;
  /** HEAD before the sync, when the tree already had one */
  previousRevision?: string;
  action: SyncAction;
}
