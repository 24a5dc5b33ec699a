// =====================================================
// Scoutline Shared Types
// =====================================================

export * from './api.types';
export * from './sync.types';
export * from './scouting.types';
