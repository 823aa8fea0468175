import { z } from 'zod'

export const RingStatusSchema = z.object({
  profileRingStatus: z.string().nullable(),
  isHiring: z.boolean(),
  isOpenToWork: z.boolean(),
})

export type RingStatus = z.infer<typeof RingStatusSchema>

export const MutualConnectionsSchema = z.object({
  mutualConnectionsCount: z.number().int().nonnegative(),
  mutualConnectionsUrl: z.string().nullable(),
})

export type MutualConnections = z.infer<typeof MutualConnectionsSchema>

export const SearchResultSchema = z
  .object({
    urnId: z.string().nullable(),
    name: z.string().nullable(),
    jobTitle: z.string().nullable(),
    location: z.string().nullable(),
    profileUrl: z.string().nullable(),
    imageUrl: z.string().nullable(),
    distance: z.string().nullable(),
    publicIdentifier: z.string().nullable(),
    connectionDegree: z.string().nullable(),
    isPremium: z.boolean(),
    company: z.string().nullable(),
    memberId: z.number().int().nullable(),
  })
  .merge(MutualConnectionsSchema)
  .merge(RingStatusSchema)

export type SearchResult = z.infer<typeof SearchResultSchema>

export const SearchOptionsSchema = z.object({
  /** Keep profiles outside the viewer's network ("LinkedIn Member") */
  includePrivateProfiles: z.boolean().default(false),
})

export type SearchOptions = z.input<typeof SearchOptionsSchema>
