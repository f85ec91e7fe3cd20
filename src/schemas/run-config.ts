import { z } from "zod";

export const RunConfigSchema = z.object({
  pipeline_id: z.string().min(1),
  run_dir: z.string().min(1),
});

export type RunConfig = z.infer<typeof RunConfigSchema>;
