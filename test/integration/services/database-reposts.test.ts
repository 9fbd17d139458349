import type { RepostRecord } from '@root/types/reposts.types.js'
import { DatabaseService } from '@services/database.service.js'
import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest'
import {
  initializeTestDatabase,
  resetDatabase,
  TEST_DB_PATH,
} from '../../helpers/database.js'
import { createMockLogger } from '../../mocks/logger.js'

const ALICE = 'alice-pubkey'
const BOB = 'bob-pubkey'

const record = (
  addressableId: string,
  repostEventId: string,
  createdAt: number,
): RepostRecord => ({
  addressableId,
  repostEventId,
  originalAuthorPubkey: 'author-pubkey',
  createdAt,
})

describe('Database personal reposts', () => {
  let db: DatabaseService

  beforeAll(async () => {
    await initializeTestDatabase()
    db = new DatabaseService(createMockLogger(), TEST_DB_PATH)
  })

  afterAll(async () => {
    await db.close()
  })

  beforeEach(async () => {
    await resetDatabase()
  })

  it('should store and read back a record', async () => {
    await db.upsertPersonalRepost(ALICE, record('34236:a:1', 'r-1', 100))

    await expect(db.getPersonalRepost(ALICE, '34236:a:1')).resolves.toEqual(
      record('34236:a:1', 'r-1', 100),
    )
    await expect(
      db.getPersonalRepostEventId(ALICE, '34236:a:1'),
    ).resolves.toBe('r-1')
    await expect(db.isPersonallyReposted(ALICE, '34236:a:1')).resolves.toBe(
      true,
    )
  })

  it('should replace the record for the same addressable id', async () => {
    await db.upsertPersonalRepost(ALICE, record('34236:a:1', 'r-1', 100))
    await db.upsertPersonalRepost(ALICE, record('34236:a:1', 'r-2', 200))

    await expect(db.getAllPersonalReposts(ALICE)).resolves.toEqual([
      record('34236:a:1', 'r-2', 200),
    ])
  })

  it('should scope records to their user', async () => {
    await db.upsertPersonalRepost(ALICE, record('34236:a:1', 'r-1', 100))
    await db.upsertPersonalRepost(BOB, record('34236:a:1', 'r-9', 150))

    await expect(db.getPersonalRepostEventId(BOB, '34236:a:1')).resolves.toBe(
      'r-9',
    )
    await expect(db.clearPersonalReposts(ALICE)).resolves.toBe(1)
    await expect(db.getAllPersonalReposts(ALICE)).resolves.toEqual([])
    await expect(db.isPersonallyReposted(BOB, '34236:a:1')).resolves.toBe(
      true,
    )
  })

  it('should return records most recent first', async () => {
    await db.upsertPersonalRepostsBatch(ALICE, [
      record('34236:a:1', 'r-1', 100),
      record('34236:a:2', 'r-2', 300),
      record('34236:a:3', 'r-3', 200),
    ])

    const records = await db.getAllPersonalReposts(ALICE)

    expect(records.map((r) => r.addressableId)).toEqual([
      '34236:a:2',
      '34236:a:3',
      '34236:a:1',
    ])
    await expect(db.getPersonalRepostAddressableIds(ALICE)).resolves.toEqual(
      new Set(['34236:a:1', '34236:a:2', '34236:a:3']),
    )
  })

  it('should upsert batches larger than one statement', async () => {
    const records = Array.from({ length: 250 }, (_, i) =>
      record(`34236:a:${i}`, `r-${i}`, i),
    )

    await db.upsertPersonalRepostsBatch(ALICE, records)

    const stored = await db.getPersonalRepostAddressableIds(ALICE)
    expect(stored.size).toBe(250)
  })

  it('should report whether a delete removed anything', async () => {
    await db.upsertPersonalRepost(ALICE, record('34236:a:1', 'r-1', 100))

    await expect(db.deletePersonalRepost(ALICE, '34236:a:1')).resolves.toBe(
      true,
    )
    await expect(db.deletePersonalRepost(ALICE, '34236:a:1')).resolves.toBe(
      false,
    )
    await expect(db.getPersonalRepost(ALICE, '34236:a:1')).resolves.toBeNull()
    await expect(
      db.getPersonalRepostEventId(ALICE, '34236:a:1'),
    ).resolves.toBeNull()
  })
})
