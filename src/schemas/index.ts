export {
  ClassRefSchema,
  type ClassRef,
  ConfigDocumentValueSchema,
  type ConfigDocumentValue,
  ConfigDocumentSchema,
  type ConfigDocument,
} from "./config-document.js";
export { RunConfigSchema, type RunConfig } from "./run-config.js";
export {
  RunStatusSchema,
  type RunStatus,
  StageRecordSchema,
  type StageRecord,
  RunMetadataSchema,
  type RunMetadata,
} from "./run-metadata.js";
export type { RunContext, Stage, StageDefinition } from "./stage.js";
