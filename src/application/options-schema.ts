import { z } from 'zod';

/**
 * Zod schemas for the parts of a timed definition that can be checked
 * before the function is ever called.
 *
 * - `metric` segments must be non-empty strings; an empty array means
 *   "derive the default".
 * - `name` and `marker`, when given, must be non-empty.
 */
export const metricNameSchema = z.array(
  z.string({ invalid_type_error: 'Metric segments must be strings' })
    .min(1, 'Metric segments must not be empty'),
);

export const timedOptionsSchema = z.object({
  name: z.string().min(1, 'Name must not be empty').optional(),
  metric: metricNameSchema.optional(),
  marker: z.string().min(1, 'Marker must not be empty').optional(),
});

export type TimedOptionsInput = z.infer<typeof timedOptionsSchema>;

/** Flattens zod issues into `path: message` lines. */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path === '' ? issue.message : `${path}: ${issue.message}`;
  });
}
