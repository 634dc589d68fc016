/**
 * Course layout validation.
 *
 * Layout files list segment descriptors; any attribute left out takes the
 * plain value (flat, unbanked, open). Validation happens once at load time,
 * never inside the tick.
 */

import { z } from 'zod';
import { TURN_ANGLES, ELEVATIONS, BANKINGS, SEGMENT_STYLES } from '../engine/segments';

const segmentSchema = z
  .object({
    turn: z.enum(TURN_ANGLES),
    elevation: z.enum(ELEVATIONS).default('Flat'),
    banking: z.enum(BANKINGS).default('Flat'),
    style: z.enum(SEGMENT_STYLES).default('Open'),
  })
  .strict();

export const courseLayoutSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  /** 1 (easy) to 5 (master) */
  difficulty: z.number().int().min(1).max(5),
  segments: z.array(segmentSchema).min(1),
});

export type CourseLayout = z.infer<typeof courseLayoutSchema>;

/** Validate raw layout JSON. Throws naming the first offending entry. */
export function parseCourseLayout(raw: unknown): CourseLayout {
  const result = courseLayoutSchema.safeParse(raw);
  if (!result.success) {
    const [issue] = result.error.issues;
    const where = issue.path.length > 0 ? issue.path.join('.') : 'layout';
    throw new Error(`Invalid course layout at ${where}: ${issue.message}`);
  }
  return result.data;
}
