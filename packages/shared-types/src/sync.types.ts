// =====================================================
// Sync Run Types
// =====================================================

export type SyncType = 'competitions' | 'players';

export type SyncRunStatus = 'in_progress' | 'completed' | 'failed';

export interface SyncRunCounters {
  recordsFetched: number;
  recordsInserted: number;
  recordsUpdated: number;
  recordsFailed: number;
}

export interface SyncRunMetadata {
  errors: string[];
}

export interface SyncRun extends SyncRunCounters {
  id: number;
  syncType: SyncType;
  status: SyncRunStatus;
  startedAt: Date;
  completedAt: Date | null;
  durationSeconds: number | null;
  errorMessage: string | null;
  metadata: SyncRunMetadata | null;
}

// Final state written when a run leaves in_progress
export interface SyncRunClosure extends SyncRunCounters {
  status: Exclude<SyncRunStatus, 'in_progress'>;
  completedAt: Date;
  durationSeconds: number;
  errorMessage: string | null;
  metadata: SyncRunMetadata;
}
