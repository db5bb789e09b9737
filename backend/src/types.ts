/**
 * Type definitions for the indexer services
 * @module types
 */

// Re-export lookup service types
export type {
  AchievementRecord,
  BindingFilters,
  BindingQuery,
  BindingRecord,
  BindingStorage,
  IndexingFailure,
  LookupQuestion,
  PurchaseRecord
} from './lookup-services/types.js'
