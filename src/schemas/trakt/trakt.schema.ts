import { z } from 'zod'

export const TraktIdsSchema = z.object({
  trakt: z.number(),
  slug: z.string().nullish(),
  imdb: z.string().nullish(),
  tmdb: z.number().nullish(),
})

export const TraktMovieSchema = z.object({
  title: z.string(),
  year: z.number().nullable(),
  ids: TraktIdsSchema,
})

/** One entry of `GET /users/me/history/movies` */
export const TraktHistoryItemSchema = z.object({
  id: z.number(),
  watched_at: z.string().nullish(),
  action: z.string().optional(),
  type: z.literal('movie'),
  movie: TraktMovieSchema,
})

/** One entry of `GET /users/me/ratings/movies` */
export const TraktRatingItemSchema = z.object({
  rated_at: z.string().nullish(),
  rating: z.number(),
  type: z.literal('movie'),
  movie: TraktMovieSchema,
})

export const TraktHistoryPageSchema = z.array(TraktHistoryItemSchema)
export const TraktRatingsSchema = z.array(TraktRatingItemSchema)

export type TraktIds = z.infer<typeof TraktIdsSchema>
export type TraktMovie = z.infer<typeof TraktMovieSchema>
export type TraktHistoryItem = z.infer<typeof TraktHistoryItemSchema>
export type TraktRatingItem = z.infer<typeof TraktRatingItemSchema>
