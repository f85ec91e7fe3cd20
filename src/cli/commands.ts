import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { Configuration } from "../configuration.js";
import { deriveNextStageConfig, deriveStageChain } from "../derive.js";
import {
  INPUT_LOCATION,
  OUTPUT_LOCATION,
  VERTEX_INPUT_FORMAT_CLASS,
} from "../keys.js";
import { ConfigDocumentSchema } from "../schemas/config-document.js";
import { DERIVE_USAGE, MAIN_USAGE, PLAN_USAGE } from "./help.js";
import type { DeriveArgs, HelpArgs, PlanArgs } from "./parse-args.js";

type LoadResult =
  | { ok: true; config: Configuration }
  | { ok: false; error: string; issues?: string[] };

export function loadConfiguration(configPath: string): LoadResult {
  const path = resolve(configPath);
  if (!existsSync(path)) {
    return { ok: false, error: `configuration file does not exist: ${path}` };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    return {
      ok: false,
      error: `configuration file is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    };
  }

  const result = ConfigDocumentSchema.safeParse(raw);
  if (!result.success) {
    return {
      ok: false,
      error: "invalid configuration:",
      issues: result.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
      ),
    };
  }
  return { ok: true, config: Configuration.fromObject(result.data) };
}

function reportLoadFailure(error: string, issues: string[] = []): number {
  console.error(`Error: ${error}`);
  for (const issue of issues) {
    console.error(`  ${issue}`);
  }
  return 1;
}

function failure(err: unknown): number {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  return 1;
}

export function runHelp(args: HelpArgs): number {
  switch (args.topic) {
    case "derive":
      console.log(DERIVE_USAGE);
      break;
    case "plan":
      console.log(PLAN_USAGE);
      break;
    default:
      console.log(MAIN_USAGE);
  }
  return 0;
}

export function runDerive(args: DeriveArgs): number {
  const loaded = loadConfiguration(args.configPath);
  if (!loaded.ok) return reportLoadFailure(loaded.error, loaded.issues);

  let config = loaded.config;
  try {
    for (let hop = 0; hop < args.hops; hop++) {
      config = deriveNextStageConfig(config);
    }
  } catch (err) {
    return failure(err);
  }

  console.log(JSON.stringify(config.toObject(), null, 2));
  return 0;
}

export function runPlan(args: PlanArgs): number {
  const loaded = loadConfiguration(args.configPath);
  if (!loaded.ok) return reportLoadFailure(loaded.error, loaded.issues);

  let lines: string[];
  try {
    lines = deriveStageChain(loaded.config, args.stages).map(
      (config, index) =>
        `  stage ${index + 1}: ` +
        `input=${config.getString(INPUT_LOCATION) ?? "-"} ` +
        `output=${config.getString(OUTPUT_LOCATION) ?? "-"} ` +
        `vertexInputFormat=${config.getName(VERTEX_INPUT_FORMAT_CLASS) ?? "-"}`,
    );
  } catch (err) {
    return failure(err);
  }

  console.log(`[stage-handoff] plan`);
  console.log(`  config: ${resolve(args.configPath)}`);
  console.log(`  stages: ${args.stages}`);
  console.log();
  for (const line of lines) {
    console.log(line);
  }
  return 0;
}
