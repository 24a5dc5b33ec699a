// =====================================================
// Ingest - Public Exports
// =====================================================

export * from './ingest-pipeline.service';
export * from './competition-source';
export * from './sync-run.tracker';
export * from './store';
export * from './mappers';
