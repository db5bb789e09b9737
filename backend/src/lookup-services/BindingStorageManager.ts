import { Collection, Db, Filter } from 'mongodb'
import {
  AchievementRecord,
  BindingFilters,
  BindingRecord,
  BindingStorage,
  PurchaseRecord
} from './types.js'

/**
 * Storage manager for the binding lookup service using MongoDB.
 */
export class BindingStorageManager implements BindingStorage {
  private readonly bindings: Collection<BindingRecord>
  private readonly purchases: Collection<PurchaseRecord>
  private readonly achievements: Collection<AchievementRecord>

  /**
   * @param db A connected MongoDB database handle.
   */
  constructor (private readonly db: Db) {
    this.bindings = db.collection<BindingRecord>('bindingRecords')
    this.purchases = db.collection<PurchaseRecord>('purchaseRecords')
    this.achievements = db.collection<AchievementRecord>('achievementRecords')

    // One live binding per (contract, token, achievement)
    this.bindings
      .createIndex({ contractAddress: 1, tokenId: 1, achievementId: 1 }, { unique: true })
      .catch(console.error)

    this.bindings
      .createIndex({ achievementId: 1 })
      .catch(console.error)

    this.bindings
      .createIndex({ operator: 1 })
      .catch(console.error)

    this.purchases
      .createIndex({ achievementId: 1 })
      .catch(console.error)

    this.achievements
      .createIndex({ achievementId: 1 }, { unique: true })
      .catch(console.error)
  }

  /**
   * Insert a new binding record.
   */
  async storeBinding (record: Omit<BindingRecord, 'createdAt'>): Promise<void> {
    await this.bindings.insertOne({ ...record, createdAt: new Date() })
  }

  /**
   * Remove the binding of an achievement to an external token.
   */
  async deleteBinding (contractAddress: string, tokenId: string, achievementId: string): Promise<void> {
    await this.bindings.deleteOne({ contractAddress, tokenId, achievementId })
  }

  async storePurchase (record: Omit<PurchaseRecord, 'createdAt'>): Promise<void> {
    await this.purchases.insertOne({ ...record, createdAt: new Date() })
  }

  async storeAchievement (record: Omit<AchievementRecord, 'createdAt'>): Promise<void> {
    await this.achievements.insertOne({ ...record, createdAt: new Date() })
  }

  /**
   * Find bindings with dynamic filter combinations.
   */
  async findBindingsWithFilters (
    filters: BindingFilters,
    limit: number = 50,
    skip: number = 0,
    sortOrder: 'asc' | 'desc' = 'desc'
  ): Promise<BindingRecord[]> {
    const query: Filter<BindingRecord> = {}

    if (filters.contractAddress !== undefined) {
      query.contractAddress = filters.contractAddress
    }
    if (filters.tokenId !== undefined) {
      query.tokenId = filters.tokenId
    }
    if (filters.achievementId !== undefined) {
      query.achievementId = filters.achievementId
    }
    if (filters.operator !== undefined) {
      query.operator = filters.operator
    }

    const sortDirection = sortOrder === 'desc' ? -1 : 1
    return await this.bindings
      .find(query)
      .sort({ createdAt: sortDirection })
      .skip(skip)
      .limit(limit)
      .toArray()
  }

  /**
   * Purchases of an achievement, oldest first.
   */
  async findPurchases (achievementId: string): Promise<PurchaseRecord[]> {
    return await this.purchases
      .find({ achievementId })
      .sort({ createdAt: 1 })
      .toArray()
  }

  async findAchievement (achievementId: string): Promise<AchievementRecord | null> {
    return await this.achievements.findOne({ achievementId })
  }
}
