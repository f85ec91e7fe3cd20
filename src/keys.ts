/** Where a stage writes its primary result. */
export const OUTPUT_LOCATION = "graph.outputLocation";

/** Where a stage reads its input graph from. */
export const INPUT_LOCATION = "graph.inputLocation";

/** Format implementation a stage serializes vertices with on write. */
export const VERTEX_OUTPUT_FORMAT_CLASS = "graph.vertexOutputFormatClass";

/** Format implementation a stage deserializes vertices with on read. */
export const VERTEX_INPUT_FORMAT_CLASS = "graph.vertexInputFormatClass";

/**
 * Name of the auxiliary graph object every stage writes under its output
 * location. The next stage reads this object, not the primary output.
 */
export const HIDDEN_ARTIFACT = "~g";

/** Appended to an output location so the next stage writes somewhere new. */
export const OUTPUT_SUFFIX = "_";
