/**
 * Recording Validation Schemas
 * Zod schemas for validating recording requests.
 */

import { z } from "zod";

export const registerRecordingSchema = z.object({
  service_timestamp: z.string().datetime({ offset: true, message: "Must be an ISO 8601 timestamp" }),
  audio_path: z.string().min(1),
  transcript_path: z.string().min(1).optional(),
});

export type RegisterRecordingBody = z.infer<typeof registerRecordingSchema>;
