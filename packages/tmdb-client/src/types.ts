import { z } from 'zod'

export const GENDERS = ['unknown', 'female', 'male', 'non-binary'] as const

export type Gender = (typeof GENDERS)[number]

const GenderSchema = z
  .number()
  .int()
  .min(0)
  .max(GENDERS.length - 1)
  .transform((code): Gender => GENDERS[code])

// TMDB sends null for unknown optional fields; normalize absent ones to null too
const nullableString = z.string().nullable().optional().transform((v) => v ?? null)

export const ActorDetailsSchema = z.object({
  id: z.number().int().nonnegative(),
  name: z.string(),
  also_known_as: z.array(z.string()).default([]),
  biography: z.string().default(''),
  birthday: nullableString,
  deathday: nullableString,
  gender: GenderSchema.default(0),
  homepage: nullableString,
  imdb_id: nullableString,
  known_for_department: z.string().default(''),
  place_of_birth: nullableString,
  popularity: z.number().default(0),
  profile_path: nullableString,
})

export type ActorDetails = Readonly<z.output<typeof ActorDetailsSchema>>

export const MovieSummarySchema = z.object({
  id: z.number().int(),
  title: z.string(),
  original_title: z.string().default(''),
  original_language: z.string().default(''),
  overview: z.string().default(''),
  backdrop_path: nullableString,
  poster_path: nullableString,
  release_date: z.string().default(''),
  genre_ids: z.array(z.number().int()).default([]),
  popularity: z.number().default(0),
  vote_average: z.number().default(0),
  vote_count: z.number().int().default(0),
  adult: z.boolean().default(false),
  video: z.boolean().default(false),
})

export type MovieSummary = Readonly<z.output<typeof MovieSummarySchema>>

export const DiscoverMoviesResponseSchema = z.object({
  results: z.array(MovieSummarySchema),
})

// Search results are scanned loosely: only the first usable id matters.
export const PersonSearchResponseSchema = z.object({
  results: z.array(z.unknown()).nullable().optional(),
})

export const PersonSearchHitSchema = z.object({
  id: z.number().int(),
})
