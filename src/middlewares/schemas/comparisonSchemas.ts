/**
 * Comparison Validation Schemas
 * Zod schemas for validating comparison requests.
 */

import { z } from "zod";

const weekendGroupId = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Weekend group must be in YYYY-MM-DD format");

export const markNotifiedSchema = z
  .object({
    weekend_group_id: weekendGroupId,
    recording_id_a: z.string().min(1),
    recording_id_b: z.string().min(1),
  })
  .refine((pair) => pair.recording_id_a !== pair.recording_id_b, {
    message: "A recording is never compared with itself",
    path: ["recording_id_b"],
  });

export type MarkNotifiedBody = z.infer<typeof markNotifiedSchema>;

export const pendingQuerySchema = z.object({
  weekend_group_id: weekendGroupId.optional(),
});
