import { z } from 'zod'

/**
 * Saved Audible session, as written by the `audible` CLI after a login.
 * Only the fields needed for bearer authentication are read.
 */
export const AudibleAuthFileSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  /** Access token expiry, epoch seconds */
  expires: z.number().optional(),
  locale_code: z.string().optional(),
})

export type AudibleAuthFile = z.infer<typeof AudibleAuthFileSchema>

export const AudibleTokenRefreshResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive(),
})

export const AudibleLastPositionsResponseSchema = z.object({
  last_positions: z
    .array(
      z.object({
        asin: z.string(),
        position_ms: z.number().int().nonnegative(),
      }),
    )
    .optional(),
  asin_last_position_heard_annots: z
    .array(
      z.object({
        asin: z.string(),
        last_position_heard: z
          .object({
            position_ms: z.number().int().nonnegative().optional(),
            last_updated: z.string().optional(),
            status: z.string().optional(),
          })
          .optional(),
      }),
    )
    .optional(),
})

export type AudibleLastPositionsResponse = z.infer<
  typeof AudibleLastPositionsResponseSchema
>

const AudibleLibraryItemSchema = z.object({
  asin: z.string().optional(),
  title: z.string().optional(),
  purchase_date: z.string().optional(),
  percent_complete: z.number().nullable().optional(),
})

export const AudibleLibraryResponseSchema = z.object({
  items: z.array(AudibleLibraryItemSchema).default([]),
})

export type AudibleLibraryItem = z.infer<typeof AudibleLibraryItemSchema>
