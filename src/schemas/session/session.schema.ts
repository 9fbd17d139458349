import { z } from 'zod'

export const SessionStateResponseSchema = z.object({
  authenticated: z.boolean(),
  userPubkey: z.string().nullable(),
})

export type SessionStateResponse = z.infer<typeof SessionStateResponseSchema>
