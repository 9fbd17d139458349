import { z } from 'zod'

// Addressable IDs are checked for `kind:pubkey:d-tag` in the handlers so the
// error carries the MISSING_REFERENCE code
const AddressableIdSchema = z.string().min(1)
const EventIdSchema = z.string().min(1)
const PubkeySchema = z.string().min(1)

export const RepostRecordSchema = z.object({
  addressableId: z.string(),
  repostEventId: z.string(),
  originalAuthorPubkey: z.string(),
  createdAt: z.number().int(),
})

export const AddressableIdQuerySchema = z.object({
  addressableId: AddressableIdSchema,
})

export const RepostedIdsResponseSchema = z.object({
  addressableIds: z.array(z.string()),
})

export const RepostStatusResponseSchema = z.object({
  addressableId: z.string(),
  reposted: z.boolean(),
})

export const CreateRepostBodySchema = z.object({
  addressableId: AddressableIdSchema,
  originalAuthorPubkey: PubkeySchema,
  eventId: EventIdSchema.optional(),
})

export const CreateRepostResponseSchema = z.object({
  repostEventId: z.string(),
})

export const DeleteRepostBodySchema = z.object({
  addressableId: AddressableIdSchema,
})

export const SyncResultResponseSchema = z.object({
  orderedAddressableIds: z.array(z.string()),
  addressableIdToRepostId: z.record(z.string()),
})

export const UserRepostsParamsSchema = z.object({
  pubkey: PubkeySchema,
})

export const UserRepostsQuerySchema = z.object({
  records: z.enum(['true', 'false']).default('false'),
})

export const UserRepostsResponseSchema = z.union([
  z.object({
    pubkey: z.string(),
    records: z.array(RepostRecordSchema),
  }),
  z.object({
    pubkey: z.string(),
    addressableIds: z.array(z.string()),
  }),
])

export const RepostCountQuerySchema = z.object({
  addressableId: AddressableIdSchema.optional(),
  eventId: EventIdSchema.optional(),
})

export const RepostCountResponseSchema = z.object({
  count: z.number().int().nonnegative(),
})

export const RepostersQuerySchema = z.object({
  eventId: EventIdSchema,
})

export const RepostersResponseSchema = z.object({
  eventId: z.string(),
  pubkeys: z.array(z.string()),
})

// SSE message payload, sent as a JSON string in `data`
export const RepostedIdsEventSchema = RepostedIdsResponseSchema

export const RepostedIdsStreamResponseSchema = z
  .string()
  .describe('Server-Sent Events stream of reposted addressable ID snapshots')

export type RepostRecordResponse = z.infer<typeof RepostRecordSchema>
export type CreateRepostBody = z.infer<typeof CreateRepostBodySchema>
export type DeleteRepostBody = z.infer<typeof DeleteRepostBodySchema>
export type UserRepostsResponse = z.infer<typeof UserRepostsResponseSchema>
export type RepostedIdsEvent = z.infer<typeof RepostedIdsEventSchema>
