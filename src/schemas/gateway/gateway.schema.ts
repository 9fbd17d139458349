import { z } from 'zod'

// Signed event as relayed by the gateway
export const NostrEventSchema = z.object({
  id: z.string(),
  pubkey: z.string(),
  created_at: z.number().int(),
  kind: z.number().int(),
  tags: z.array(z.array(z.string())),
  content: z.string(),
  sig: z.string().optional(),
})

export const PublishEventResponseSchema = z.object({
  event: NostrEventSchema.nullable(),
})

// Events are validated one by one so a malformed event does not reject the batch
export const QueryEventsResponseSchema = z.object({
  events: z.array(z.unknown()),
})

export const CountEventsResponseSchema = z.object({
  count: z.number().int().nonnegative(),
})

export type PublishEventResponse = z.infer<typeof PublishEventResponseSchema>
export type QueryEventsResponse = z.infer<typeof QueryEventsResponseSchema>
export type CountEventsResponse = z.infer<typeof CountEventsResponseSchema>
