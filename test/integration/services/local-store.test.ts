import { DatabaseService } from '@services/database.service.js'
import { DbRepostsLocalStore } from '@services/reposts/index.js'
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest'
import {
  initializeTestDatabase,
  resetDatabase,
  TEST_DB_PATH,
} from '../../helpers/database.js'
import { createMockLogger } from '../../mocks/logger.js'

const VIDEO = '34236:abc:vine1'
const OTHER_VIDEO = '34236:def:vine2'

const record = (addressableId: string, createdAt: number) => ({
  addressableId,
  repostEventId: `r-${createdAt}`,
  originalAuthorPubkey: 'abc',
  createdAt,
})

describe('DbRepostsLocalStore', () => {
  let db: DatabaseService
  let store: DbRepostsLocalStore

  beforeAll(async () => {
    await initializeTestDatabase()
    db = new DatabaseService(createMockLogger(), TEST_DB_PATH)
  })

  afterAll(async () => {
    await db.close()
  })

  beforeEach(async () => {
    await resetDatabase()
    store = new DbRepostsLocalStore(db, 'test-user-pubkey', createMockLogger())
  })

  it('should persist records for its user', async () => {
    await store.upsert(record(VIDEO, 100))

    await expect(store.contains(VIDEO)).resolves.toBe(true)
    await expect(store.getEventId(VIDEO)).resolves.toBe('r-100')
    await expect(
      db.getAllPersonalReposts('someone-else'),
    ).resolves.toEqual([])
  })

  it('should skip empty batches', async () => {
    const spy = vi.spyOn(db, 'upsertPersonalRepostsBatch')

    await store.upsertBatch([])

    expect(spy).not.toHaveBeenCalled()
    spy.mockRestore()
  })

  it('should clear only its own user', async () => {
    await db.upsertPersonalRepost('someone-else', record(VIDEO, 50))
    await store.upsertBatch([record(VIDEO, 100), record(OTHER_VIDEO, 200)])

    await store.clearAllForUser()

    await expect(store.getAll()).resolves.toEqual([])
    await expect(
      db.isPersonallyReposted('someone-else', VIDEO),
    ).resolves.toBe(true)
  })

  it('should emit the stored set and then every change', async () => {
    await store.upsert(record(VIDEO, 100))
    const snapshots: string[][] = []

    const unsubscribe = store.watchAllAddressableIds((ids) =>
      snapshots.push([...ids].sort()),
    )
    await vi.waitFor(() => {
      expect(snapshots).toEqual([[VIDEO]])
    })

    await store.upsert(record(OTHER_VIDEO, 200))
    await store.delete(VIDEO)
    await store.delete(VIDEO)
    unsubscribe()
    await store.clearAllForUser()

    expect(snapshots).toEqual([[VIDEO], [OTHER_VIDEO, VIDEO], [OTHER_VIDEO]])
  })

  it('should not subscribe when unsubscribed before the first read', async () => {
    const listener = vi.fn()

    const unsubscribe = store.watchAllAddressableIds(listener)
    unsubscribe()
    await store.upsert(record(VIDEO, 100))
    await store.getAll()

    expect(listener).not.toHaveBeenCalled()
  })
})
