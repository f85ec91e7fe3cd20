import { z } from "zod";

export const RunStatusSchema = z.enum([
  "running",
  "completed",
  "failed",
]);

export type RunStatus = z.infer<typeof RunStatusSchema>;

export const StageRecordSchema = z.object({
  name: z.string().min(1),
  input_location: z.string().optional(),
  output_location: z.string().optional(),
});

export type StageRecord = z.infer<typeof StageRecordSchema>;

export const RunMetadataSchema = z.object({
  run_id: z.string().uuid(),
  pipeline_id: z.string().min(1),
  started_at: z.string().datetime(),
  completed_at: z.string().datetime().optional(),
  stages_completed: z.array(StageRecordSchema),
  status: RunStatusSchema,
  error: z.string().optional(),
});

export type RunMetadata = z.infer<typeof RunMetadataSchema>;
