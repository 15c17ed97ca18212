/**
 * Programme Input
 *
 * Schemas for the raw programme a planner is fed: events with their
 * showings, the venue transit table and planner settings. Shape only:
 * value rules (positive durations, known venues, a complete symmetric
 * table) belong to the transit table and catalog constructors, which throw
 * the dedicated errors.
 */

import { z } from 'zod'
import { InvalidConfigError } from './errors'

export { InvalidConfigError } from './errors'

// ============================================================================
// Schemas
// ============================================================================

export const occurrenceInputSchema = z.object({
  start: z.string().min(1, 'Start is required'),
  venue: z.string().min(1, 'Venue is required'),
})

export const eventInputSchema = z.object({
  title: z.string().min(1, 'Title is required'),
  durationMinutes: z.number(),
  occurrences: z.array(occurrenceInputSchema),
})

export const transitTimesSchema = z.record(z.string().min(1), z.record(z.string().min(1), z.number()))

export const searchLimitsSchema = z.object({
  maxIterations: z.number().int().positive().optional(),
  timeLimitMs: z.number().int().positive().optional(),
})

export const plannerConfigSchema = z.object({
  transitTimes: transitTimesSchema,
  sameVenueMinutes: z.number().optional(),
  limits: searchLimitsSchema.optional(),
})

export const programmeInputSchema = z.object({
  events: z.array(eventInputSchema),
  transitTimes: transitTimesSchema,
  sameVenueMinutes: z.number().optional(),
})

export type ProgrammeInput = z.infer<typeof programmeInputSchema>
export type PlannerSettings = z.infer<typeof plannerConfigSchema>

// ============================================================================
// Parsing
// ============================================================================

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ')
}

/** @throws InvalidConfigError listing every schema issue */
export function parseProgramme(raw: unknown): ProgrammeInput {
  const result = programmeInputSchema.safeParse(raw)
  if (!result.success) {
    throw new InvalidConfigError(`Invalid programme: ${describeIssues(result.error)}`)
  }
  return result.data
}

/** @throws InvalidConfigError listing every schema issue */
export function parsePlannerConfig(raw: unknown): PlannerSettings {
  const result = plannerConfigSchema.safeParse(raw)
  if (!result.success) {
    throw new InvalidConfigError(`Invalid planner config: ${describeIssues(result.error)}`)
  }
  return result.data
}
