export const MAIN_USAGE = `stage-handoff — derive the next pipeline stage's configuration

Usage:
  stage-handoff <command> [options]

Commands:
  derive <config.json>     Print the input configuration of the next stage
  plan <config.json>       Print the locations and formats of a stage chain

Options:
  --help, -h               Show this help message

Run "stage-handoff <command> --help" for command-specific options.`;

export const DERIVE_USAGE = `stage-handoff derive — derive the next stage's configuration

Usage:
  stage-handoff derive <config.json> [options]

Arguments:
  <config.json>            Output configuration of a finished stage (JSON object)

Options:
  --hops <n>               Number of stages to derive forward (default: 1, max: 1000)
  --help, -h               Show this help message

Numbers are read as JSON numbers: integers beyond 2^53 (9007199254740991)
lose precision. Store such values as strings to copy them exactly.`;

export const PLAN_USAGE = `stage-handoff plan — show where each stage of a chain reads and writes

Usage:
  stage-handoff plan <config.json> [options]

Arguments:
  <config.json>            Configuration of the first stage (JSON object)

Options:
  --stages <n>             Number of stages in the chain (default: 3, max: 1000)
  --help, -h               Show this help message`;
