import { normalizeAddress, type LedgerEvent, type TokenBoundLedger } from '@token-bound/core'
import { Db } from 'mongodb'
import { BindingStorageManager } from './BindingStorageManager.js'
import {
  AchievementRecord,
  BindingQuery,
  BindingRecord,
  BindingStorage,
  IndexingFailure,
  LookupQuestion,
  PurchaseRecord
} from './types.js'
import docs from '../docs/BindingLookupDocs.js'

const LOG_PREFIX = '[BindingLookupService]'
const DECIMAL = /^\d+$/

function isRecord (value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function optionalAddress (query: Record<string, unknown>, field: string): string | undefined {
  const value = query[field]
  if (value === undefined) return undefined
  if (typeof value !== 'string') {
    throw new Error(`${field} must be a hex address`)
  }
  return normalizeAddress(value, field)
}

function optionalDecimal (query: Record<string, unknown>, field: string): string | undefined {
  const value = query[field]
  if (value === undefined) return undefined
  if (typeof value !== 'string' || !DECIMAL.test(value)) {
    throw new Error(`${field} must be a decimal string`)
  }
  return BigInt(value).toString()
}

function optionalCount (query: Record<string, unknown>, field: string): number | undefined {
  const value = query[field]
  if (value === undefined) return undefined
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new Error(`${field} must be a non-negative integer`)
  }
  return value
}

/**
 * Implements a lookup service over token-bound ledger events
 * @public
 */
class BindingLookupService {
  private static readonly SERVICE_ID = 'ls_token_bound'

  private indexing: Promise<void> = Promise.resolve()
  private readonly failures: IndexingFailure[] = []

  constructor (public storageManager: BindingStorage) { }

  /**
   * Index every event the ledger emits, in emission order.
   *
   * @returns A function that stops indexing
   */
  attach (ledger: Pick<TokenBoundLedger, 'subscribe'>): () => void {
    return ledger.subscribe((event) => {
      this.indexing = this.indexing
        .then(async () => await this.handleEvent(event))
        .catch((error: unknown) => {
          this.failures.push({ eventType: event.type, error })
        })
    })
  }

  /**
   * Wait for attached events to be indexed.
   *
   * @returns The events that failed since the last call
   */
  async drain (): Promise<IndexingFailure[]> {
    await this.indexing
    return this.failures.splice(0)
  }

  async handleEvent (event: LedgerEvent): Promise<void> {
    try {
      switch (event.type) {
        case 'MintTokenBoundToken':
          await this.storageManager.storeAchievement({
            achievementId: event.achievementId.toString(),
            to: event.to,
            amount: event.amount.toString(),
            price: event.price.toString(),
            permanent: event.permanent
          })
          break
        case 'BindTokenBoundToken':
          await this.storageManager.storeBinding({
            contractAddress: event.contractAddress,
            tokenId: event.tokenId.toString(),
            achievementId: event.achievementId.toString(),
            operator: event.operator,
            uri: event.uri
          })
          break
        case 'UnbindTokenBoundToken':
          await this.storageManager.deleteBinding(
            event.contractAddress,
            event.tokenId.toString(),
            event.achievementId.toString()
          )
          break
        case 'PurchaseTokenBoundToken':
          await this.storageManager.storePurchase({
            achievementId: event.achievementId.toString(),
            operator: event.operator
          })
          break
      }
    } catch (error) {
      console.error(`${LOG_PREFIX} Error indexing ${event.type}:`, error)
      throw error
    }
  }

  async lookup (question: LookupQuestion): Promise<BindingRecord[]> {
    if (question.query === undefined || question.query === null) {
      throw new Error('A valid query must be provided')
    }
    if (question.service !== BindingLookupService.SERVICE_ID) {
      throw new Error('Lookup service not supported')
    }

    const query = this.parseQuery(question.query)
    return await this.storageManager.findBindingsWithFilters(
      {
        contractAddress: query.contractAddress,
        tokenId: query.tokenId,
        achievementId: query.achievementId,
        operator: query.operator
      },
      query.limit,
      query.skip,
      query.sortOrder
    )
  }

  async purchasesOf (achievementId: bigint): Promise<PurchaseRecord[]> {
    return await this.storageManager.findPurchases(achievementId.toString())
  }

  async achievement (achievementId: bigint): Promise<AchievementRecord | null> {
    return await this.storageManager.findAchievement(achievementId.toString())
  }

  async getDocumentation (): Promise<string> {
    return docs
  }

  async getMetaData (): Promise<{
    name: string
    shortDescription: string
    iconURL?: string
    version?: string
    informationURL?: string
  }> {
    return {
      name: 'Token-Bound Binding Lookup Service',
      shortDescription: 'Find achievement bindings by NFT contract, token, achievement or operator.'
    }
  }

  private parseQuery (query: unknown): BindingQuery {
    if (!isRecord(query)) {
      throw new Error('A valid query must be provided')
    }
    const requested = query.sortOrder
    let sortOrder: 'asc' | 'desc' | undefined
    if (requested === 'asc' || requested === 'desc') {
      sortOrder = requested
    } else if (requested !== undefined) {
      throw new Error('sortOrder must be "asc" or "desc"')
    }
    return {
      contractAddress: optionalAddress(query, 'contractAddress'),
      tokenId: optionalDecimal(query, 'tokenId'),
      achievementId: optionalDecimal(query, 'achievementId'),
      operator: optionalAddress(query, 'operator'),
      limit: optionalCount(query, 'limit'),
      skip: optionalCount(query, 'skip'),
      sortOrder
    }
  }
}

// Factory function
export default (db: Db): BindingLookupService => {
  return new BindingLookupService(new BindingStorageManager(db))
}

export { BindingLookupService }
