import { z } from 'zod'

/**
 * VM names accepted by the admin API
 */
export const vmNameSchema = z
  .string()
  .min(1, 'VM name is required')
  .max(31, 'VM name must be 31 characters or less')
  .regex(/^[a-zA-Z][a-zA-Z0-9_.-]*$/, 'VM name contains invalid characters')

/**
 * Zod schema for events decoded from the admin event stream
 */
export const adminEventSchema = z.object({
  subject: vmNameSchema.nullable(),
  event: z.string().min(1, 'Event name is required'),
  kwargs: z.record(z.string()),
})
