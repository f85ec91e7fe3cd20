import type { Configuration } from "../configuration.js";
import type { RunConfig } from "./run-config.js";

/**
 * RunContext is passed to every stage during a chain run.
 * Access the run directory via run.run_dir.
 */
export interface RunContext {
  readonly run: RunConfig;
  readonly run_id: string;
  /** Zero-based position of the stage in the chain. */
  readonly stage_index: number;
}

/**
 * Stage is the contract for one batch job in the chain. It reads its input
 * from and writes its output to the locations named in `config`, and may
 * record further output settings on `config` before it resolves.
 */
export type Stage = (config: Configuration, ctx: RunContext) => Promise<void>;

/**
 * StageDefinition pairs a stage function with its name for orchestrator use.
 */
export interface StageDefinition {
  readonly name: string;
  readonly run: Stage;
}
