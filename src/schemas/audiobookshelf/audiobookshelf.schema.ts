import { z } from 'zod'

const MediaSchema = z.object({
  id: z.string().optional(),
  duration: z.number().optional(),
  metadata: z
    .object({
      asin: z.string().nullable().optional(),
      title: z.string().nullable().optional(),
    })
    .optional(),
})

export const MediaProgressSchema = z.object({
  id: z.string().optional(),
  libraryItemId: z.string().optional(),
  currentTime: z.number().nonnegative().nullable().optional(),
  duration: z.number().nullable().optional(),
  isFinished: z.boolean().optional(),
  /** Epoch milliseconds */
  lastUpdate: z.number().nullable().optional(),
  media: MediaSchema.optional(),
})

export type MediaProgress = z.infer<typeof MediaProgressSchema>

const UserSchema = z.object({
  id: z.string().optional(),
  mediaProgress: z.array(MediaProgressSchema).default([]),
})

/**
 * `/api/me` answers with the user at the root on current servers and wrapped
 * in `user` on older ones; both are normalised to the user object.
 */
export const MeResponseSchema = UserSchema.extend({
  user: UserSchema.optional(),
}).transform((body) => {
  const user = body.user ?? body
  return { id: user.id, mediaProgress: user.mediaProgress }
})

export type MeResponse = z.output<typeof MeResponseSchema>

export const LibrariesResponseSchema = z.object({
  libraries: z
    .array(z.object({ id: z.string(), name: z.string().optional() }))
    .default([]),
})

const LibraryItemSchema = z.object({
  id: z.string().optional(),
  media: MediaSchema.optional(),
})

/** Search hits wrap the item in `libraryItem` on current servers */
const SearchEntrySchema = LibraryItemSchema.extend({
  libraryItem: LibraryItemSchema.optional(),
}).transform((entry) => entry.libraryItem ?? entry)

export type SearchEntry = z.output<typeof SearchEntrySchema>

/**
 * Library search results are keyed by media type (`book`), some versions
 * use `audiobooks` or `results`, and very old ones return a bare array.
 */
export const LibrarySearchResponseSchema = z
  .union([
    z.array(SearchEntrySchema),
    z.object({
      book: z.array(SearchEntrySchema).default([]),
      audiobooks: z.array(SearchEntrySchema).default([]),
      results: z.array(SearchEntrySchema).default([]),
    }),
  ])
  .transform((body): SearchEntry[] =>
    Array.isArray(body)
      ? body
      : [...body.book, ...body.audiobooks, ...body.results],
  )
