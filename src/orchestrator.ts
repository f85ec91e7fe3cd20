import { randomUUID } from "node:crypto";
import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { Configuration } from "./configuration.js";
import { deriveNextStageConfig } from "./derive.js";
import { INPUT_LOCATION, OUTPUT_LOCATION } from "./keys.js";
import { createRunLogger } from "./logger.js";
import type { RunConfig } from "./schemas/run-config.js";
import type { RunMetadata, StageRecord } from "./schemas/run-metadata.js";
import type { RunContext, StageDefinition } from "./schemas/stage.js";

export type PipelineStage = StageDefinition;

/** Mutable working copy — avoids casting readonly arrays from Zod-inferred types. */
interface MutableRunMetadata {
  run_id: string;
  pipeline_id: string;
  started_at: string;
  completed_at?: string;
  stages_completed: StageRecord[];
  status: "running" | "completed" | "failed";
  error?: string;
}

function writeRunMetadata(runDir: string, metadata: MutableRunMetadata): void {
  writeFileSync(join(runDir, "run.json"), JSON.stringify(metadata, null, 2));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function stageRecord(name: string, config: Configuration): StageRecord {
  const record: StageRecord = { name };
  const input = config.getString(INPUT_LOCATION);
  const output = config.getString(OUTPUT_LOCATION);
  if (input !== undefined) record.input_location = input;
  if (output !== undefined) record.output_location = output;
  return record;
}

/**
 * Run `stages` in order. The first stage gets a copy of `initial`; every
 * later stage gets the configuration derived from the one its predecessor
 * finished with, so each stage reads what the previous one wrote.
 *
 * Progress goes to `run.json` and `run.log` under `run.run_dir`. A stage
 * that throws ends the run as failed; it is not retried.
 */
export async function runStageChain(
  run: RunConfig,
  initial: Configuration,
  stages: PipelineStage[],
): Promise<RunMetadata> {
  const run_id = randomUUID();
  mkdirSync(run.run_dir, { recursive: true });

  const metadata: MutableRunMetadata = {
    run_id,
    pipeline_id: run.pipeline_id,
    started_at: new Date().toISOString(),
    stages_completed: [],
    status: "running",
  };

  const logger = createRunLogger(join(run.run_dir, "run.log"));

  const fail = (message: string): RunMetadata => {
    logger.error(message);
    metadata.status = "failed";
    metadata.error = message;
    writeRunMetadata(run.run_dir, metadata);
    return metadata;
  };

  writeRunMetadata(run.run_dir, metadata);
  logger.info(
    `Pipeline '${run.pipeline_id}' started with ${stages.length} stages`,
  );

  let config = initial.copy();

  for (const [stage_index, stage] of stages.entries()) {
    const ctx: RunContext = { run, run_id, stage_index };

    let record: StageRecord;
    try {
      record = stageRecord(stage.name, config);
    } catch (error) {
      return fail(`Stage '${stage.name}' has invalid locations: ${errorMessage(error)}`);
    }
    logger.info(
      `Stage '${stage.name}' started (input: ${record.input_location ?? "none"}, output: ${record.output_location ?? "none"})`,
    );

    try {
      await stage.run(config, ctx);
    } catch (error) {
      return fail(`Stage '${stage.name}' threw error: ${errorMessage(error)}`);
    }

    metadata.stages_completed.push(record);
    writeRunMetadata(run.run_dir, metadata);
    logger.info(`Stage '${stage.name}' completed`);

    if (stage_index === stages.length - 1) break;

    if (!config.has(OUTPUT_LOCATION)) {
      logger.warn(
        `Stage '${stage.name}' has no ${OUTPUT_LOCATION}; the next stage gets no input location`,
      );
    }
    try {
      config = deriveNextStageConfig(config);
    } catch (error) {
      return fail(`Stage '${stage.name}' handoff failed: ${errorMessage(error)}`);
    }
  }

  metadata.status = "completed";
  metadata.completed_at = new Date().toISOString();
  writeRunMetadata(run.run_dir, metadata);
  logger.info("Pipeline completed successfully");

  return metadata;
}
