/**
 * Query parameters for binding lookups. Ids are decimal strings and
 * addresses are hex strings, as they arrive over the wire.
 */
export interface BindingQuery {
  contractAddress?: string
  tokenId?: string
  achievementId?: string
  operator?: string
  limit?: number
  skip?: number
  sortOrder?: 'asc' | 'desc'
}

/**
 * Filters applied by the storage layer, already normalized
 */
export interface BindingFilters {
  contractAddress?: string
  tokenId?: string
  achievementId?: string
  operator?: string
}

/**
 * A live binding stored in the lookup database. bigint values are kept as
 * decimal strings so they survive BSON.
 */
export interface BindingRecord {
  contractAddress: string
  tokenId: string
  achievementId: string
  operator: string
  uri: string
  createdAt: Date
}

/**
 * One purchase, kept as a permanent log entry
 */
export interface PurchaseRecord {
  achievementId: string
  operator: string
  createdAt: Date
}

/**
 * Terms an achievement was minted with
 */
export interface AchievementRecord {
  achievementId: string
  to: string
  amount: string
  price: string
  permanent: boolean
  createdAt: Date
}

/**
 * Question accepted by `BindingLookupService.lookup`
 */
export interface LookupQuestion {
  service: string
  query: unknown
}

/**
 * Persistence used by the lookup service
 */
export interface BindingStorage {
  storeBinding(record: Omit<BindingRecord, 'createdAt'>): Promise<void>
  deleteBinding(contractAddress: string, tokenId: string, achievementId: string): Promise<void>
  storePurchase(record: Omit<PurchaseRecord, 'createdAt'>): Promise<void>
  storeAchievement(record: Omit<AchievementRecord, 'createdAt'>): Promise<void>
  findBindingsWithFilters(
    filters: BindingFilters,
    limit?: number,
    skip?: number,
    sortOrder?: 'asc' | 'desc'
  ): Promise<BindingRecord[]>
  findPurchases(achievementId: string): Promise<PurchaseRecord[]>
  findAchievement(achievementId: string): Promise<AchievementRecord | null>
}

/**
 * An event the service could not index
 */
export interface IndexingFailure {
  eventType: string
  error: unknown
}
