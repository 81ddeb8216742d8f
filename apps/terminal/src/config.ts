import { parseArgs } from "node:util";
import { DEFAULT_ALPHABET, DEFAULT_WINDOW_RADIUS, EngineConfig } from "@numdrill/types";
import { EngineConfigSchema, MAX_WINDOW_RADIUS, StoredConfig } from "@numdrill/storage";

export const USAGE = `Usage: numdrill [options]

Options:
  -r, --radius <n>        Symbols shown on each side of the current one (0-${MAX_WINDOW_RADIUS}, default ${DEFAULT_WINDOW_RADIUS})
  -a, --alphabet <name>   digits (0-9) or numpad (0-9, + - * / and .) (default ${DEFAULT_ALPHABET})
      --save              Remember these settings for the next run
  -h, --help              Show this message

Keys: type the highlighted character, R resets, Q or Esc quits.`;

// Flags are checked together with the stored settings in resolveConfig
export interface ConfigOverrides {
  windowRadius?: number;
  alphabet?: string;
}

export interface CliOptions {
  overrides: ConfigOverrides;
  save: boolean;
  help: boolean;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      radius: { type: "string", short: "r" },
      alphabet: { type: "string", short: "a" },
      save: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
    allowPositionals: false,
  });

  const overrides: ConfigOverrides = {};
  if (values.radius !== undefined) overrides.windowRadius = Number(values.radius);
  if (values.alphabet !== undefined) overrides.alphabet = values.alphabet;

  return {
    overrides,
    save: values.save ?? false,
    help: values.help ?? false,
  };
}

export function resolveConfig(stored: StoredConfig | null, overrides: ConfigOverrides): EngineConfig {
  const result = EngineConfigSchema.safeParse({
    windowRadius: DEFAULT_WINDOW_RADIUS,
    alphabet: DEFAULT_ALPHABET,
    ...stored,
    ...overrides,
  });

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new RangeError(`Invalid settings: ${details}`);
  }
  return result.data;
}
