import { z } from 'zod'

// Only identifiers are checked; every other field is kept as delivered and
// read through lib/context/record-fields.

export const ActivitySchema = z.object({
    id: z.union([z.string(), z.number()]),
    type: z.string().optional().catch(undefined),
    name: z.string().nullable().optional().catch(undefined),
    start_date_local: z.string().optional().catch(undefined),
}).passthrough()

export const ActivityListSchema = z.array(ActivitySchema)

export const AthleteProfileSchema = z.object({
    id: z.union([z.string(), z.number()]).transform(String).optional(),
    name: z.string().nullable().optional().catch(undefined),
}).passthrough()

export const WellnessEntrySchema = z.object({
    id: z.string(),
}).passthrough()

export const WellnessListSchema = z.array(WellnessEntrySchema)
