import {
  Configuration,
  ConfigValueTypeError,
  classValue,
  stringValue,
  type ConfigValue,
  type ReadableConfiguration,
} from "./configuration.js";
import {
  HIDDEN_ARTIFACT,
  INPUT_LOCATION,
  OUTPUT_LOCATION,
  OUTPUT_SUFFIX,
  VERTEX_INPUT_FORMAT_CLASS,
  VERTEX_OUTPUT_FORMAT_CLASS,
} from "./keys.js";

/**
 * Guess the read-side format class from the write-side one by naming
 * convention: every "OutputFormat" in the name becomes "InputFormat".
 *
 * This is not a registry lookup. A name that does not follow the
 * convention comes back unchanged, and the caller has to set
 * VERTEX_INPUT_FORMAT_CLASS itself.
 */
export function inferInputFormat(outputFormatName: string): string {
  return outputFormatName.replaceAll("OutputFormat", "InputFormat");
}

function inputFormatFor(outputFormat: ConfigValue): ConfigValue {
  switch (outputFormat.type) {
    case "string":
      return stringValue(inferInputFormat(outputFormat.value));
    case "class":
      return classValue(inferInputFormat(outputFormat.value));
    default:
      throw new ConfigValueTypeError(
        VERTEX_OUTPUT_FORMAT_CLASS,
        ["string", "class"],
        outputFormat.type,
      );
  }
}

function copyEntries(source: ReadableConfiguration): Configuration {
  const copy = new Configuration();
  for (const key of source.keys()) {
    const value = source.get(key);
    if (value !== undefined) copy.set(key, value);
  }
  return copy;
}

/**
 * Build the input configuration of the next stage from the output
 * configuration of a finished one.
 *
 * Every entry of `source` is copied. When `source` names an output
 * location, the next stage reads the hidden artifact under it and writes to
 * the location plus a suffix. When `source` names a vertex output format,
 * the matching input format is inferred. Missing keys skip their rule.
 *
 * `source` is never modified. Errors raised while enumerating or reading it
 * propagate as they are.
 */
export function deriveNextStageConfig(
  source: ReadableConfiguration,
): Configuration {
  const next = copyEntries(source);

  const outputLocation = next.getString(OUTPUT_LOCATION);
  if (outputLocation !== undefined) {
    next.set(INPUT_LOCATION, stringValue(`${outputLocation}/${HIDDEN_ARTIFACT}`));
    next.set(OUTPUT_LOCATION, stringValue(outputLocation + OUTPUT_SUFFIX));
  }

  const outputFormat = next.get(VERTEX_OUTPUT_FORMAT_CLASS);
  if (outputFormat !== undefined) {
    next.set(VERTEX_INPUT_FORMAT_CLASS, inputFormatFor(outputFormat));
  }

  return next;
}

/**
 * Configurations for `stageCount` consecutive stages, starting with a copy
 * of `initial`.
 */
export function deriveStageChain(
  initial: ReadableConfiguration,
  stageCount: number,
): Configuration[] {
  if (!Number.isInteger(stageCount) || stageCount < 1) {
    throw new RangeError(
      `stageCount must be a positive integer, got ${stageCount}`,
    );
  }

  let current = copyEntries(initial);
  const chain = [current];
  for (let i = 1; i < stageCount; i++) {
    current = deriveNextStageConfig(current);
    chain.push(current);
  }
  return chain;
}
