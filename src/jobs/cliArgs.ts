import type { CliOverrides } from "../config.js";
import { ConfigurationError } from "../errors.js";

export interface ParsedArgs {
  help: boolean;
  overrides: CliOverrides;
}

const VALUE_FLAGS = {
  "--frequency": "frequency",
  "--lookback-days": "lookbackDays",
  "--github-token": "githubToken",
  "--products": "productsFile",
  "--output": "output",
  "--mode": "mode",
} as const satisfies Record<string, keyof CliOverrides>;

type ValueFlag = keyof typeof VALUE_FLAGS;

function isValueFlag(flag: string): flag is ValueFlag {
  return Object.prototype.hasOwnProperty.call(VALUE_FLAGS, flag);
}

// Accepts both "--flag value" and "--flag=value".
export function parseCliArgs(argv: string[]): ParsedArgs {
  const overrides: CliOverrides = {};
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--help" || arg === "-h") {
      help = true;
      continue;
    }
    if (arg === "--dry-run") {
      overrides.dryRun = true;
      continue;
    }

    const eq = arg.indexOf("=");
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    if (!isValueFlag(flag)) {
      throw new ConfigurationError(`Unknown option: ${arg}`);
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined || value.startsWith("--")) {
      throw new ConfigurationError(`Option ${flag} needs a value`);
    }

    overrides[VALUE_FLAGS[flag]] = value;
  }

  return { help, overrides };
}
