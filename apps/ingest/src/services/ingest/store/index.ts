export * from './ingest-store';
export { PgIngestStore, PgIngestWriter, PgSyncRunRepository } from './pg-ingest.store';
