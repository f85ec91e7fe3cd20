export {
  Configuration,
  ConfigValueTypeError,
  stringValue,
  numberValue,
  booleanValue,
  classValue,
  fromDocumentValue,
  toDocumentValue,
  type ConfigValue,
  type ConfigValueType,
  type ReadableConfiguration,
} from "./configuration.js";
export {
  deriveNextStageConfig,
  deriveStageChain,
  inferInputFormat,
} from "./derive.js";
export * from "./keys.js";
export { createRunLogger, type RunLogger, type LogLevel } from "./logger.js";
export { runStageChain, type PipelineStage } from "./orchestrator.js";
export * from "./schemas/index.js";
