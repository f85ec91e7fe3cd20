export type DeriveArgs = {
  command: "derive";
  configPath: string;
  hops: number;
};

export type PlanArgs = {
  command: "plan";
  configPath: string;
  stages: number;
};

export type HelpArgs = {
  command: "help";
  topic?: "derive" | "plan";
};

export type ParsedArgs = DeriveArgs | PlanArgs | HelpArgs;

export type ParseError = {
  error: string;
  usage?: string;
};

export type ParseResult =
  | { ok: true; args: ParsedArgs }
  | { ok: false; error: ParseError };

export const DEFAULT_HOPS = 1;
export const DEFAULT_PLAN_STAGES = 3;
/** Every hop lengthens the output location by one character. */
export const MAX_COUNT = 1000;

type CountResult =
  | { ok: true; count?: number; rest: string[] }
  | { ok: false; error: string };

/**
 * Pull `--<flag> N` or `--<flag>=N` out of `args`. The value must be a
 * positive integer.
 */
function extractCount(args: string[], flag: string): CountResult {
  const rest: string[] = [];
  let raw: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (arg === flag) {
      const next = args[i + 1];
      if (next === undefined || next.startsWith("-")) {
        return { ok: false, error: `Missing value for ${flag}` };
      }
      raw = next;
      i++; // skip next
    } else if (arg.startsWith(`${flag}=`)) {
      raw = arg.slice(flag.length + 1);
    } else {
      rest.push(arg);
    }
  }

  if (raw === undefined) return { ok: true, rest };

  const count = Number(raw);
  if (!/^\d+$/.test(raw) || count < 1) {
    return {
      ok: false,
      error: `${flag} must be a positive integer, got '${raw}'`,
    };
  }
  if (count > MAX_COUNT) {
    return {
      ok: false,
      error: `${flag} must be at most ${MAX_COUNT}, got '${raw}'`,
    };
  }
  return { ok: true, count, rest };
}

function parseCommandArgs(
  command: "derive" | "plan",
  args: string[],
): ParseResult {
  if (args.includes("--help") || args.includes("-h")) {
    return { ok: true, args: { command: "help", topic: command } };
  }

  const usage = `Run "stage-handoff ${command} --help" for usage information.`;
  const flag = command === "derive" ? "--hops" : "--stages";
  const extracted = extractCount(args, flag);
  if (!extracted.ok) {
    return { ok: false, error: { error: extracted.error, usage } };
  }

  const unknown = extracted.rest.find((a) => a.startsWith("-"));
  if (unknown !== undefined) {
    return { ok: false, error: { error: `Unknown option: ${unknown}`, usage } };
  }

  const configPath = extracted.rest[0];
  if (configPath === undefined) {
    return {
      ok: false,
      error: { error: "Missing required argument: <config.json>", usage },
    };
  }

  if (command === "derive") {
    return {
      ok: true,
      args: {
        command,
        configPath,
        hops: extracted.count ?? DEFAULT_HOPS,
      },
    };
  }
  return {
    ok: true,
    args: {
      command,
      configPath,
      stages: extracted.count ?? DEFAULT_PLAN_STAGES,
    },
  };
}

export function parseArgs(argv: string[]): ParseResult {
  // argv[0] = node, argv[1] = script path, argv[2+] = user args
  const args = argv.slice(2);
  const command = args[0];

  if (command === undefined || command === "--help" || command === "-h") {
    return { ok: true, args: { command: "help" } };
  }

  switch (command) {
    case "derive":
    case "plan":
      return parseCommandArgs(command, args.slice(1));
    default:
      return {
        ok: false,
        error: {
          error: `Unknown command: ${command}`,
          usage: 'Run "stage-handoff --help" for usage information.',
        },
      };
  }
}
