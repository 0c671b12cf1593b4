import { z } from 'zod';

// Event schemas for type safety
export const RunRequestedSchema = z.object({
  /** Brief date as YYYY-MM-DD; today in the schedule time zone when omitted */
  date: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD')
    .optional(),
  /** Log messages instead of sending them */
  dryRun: z.boolean().optional(),
});

// Event name constants
export const EVENTS = {
  RUN_REQUESTED: 'brief/run.requested',
} as const;

// Type exports for event data
export type RunRequestedEvent = z.infer<typeof RunRequestedSchema>;
