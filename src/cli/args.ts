export interface ParsedArgs {
  command?: string;
  positionals: string[];
  options: Record<string, string>;
  flags: Set<string>;
}

/** Options that never take a value. */
export const BOOLEAN_FLAGS: ReadonlySet<string> = new Set([
  "help",
  "debug",
  "json",
  "raw",
  "timer",
  "glass-heating",
  "seat-fl",
  "seat-fr",
  "seat-rl",
  "seat-rr",
  "climatisation-at-unlock",
]);

/** Options that take a value. */
export const VALUE_OPTIONS: ReadonlySet<string> = new Set([
  "username",
  "password",
  "country",
  "spin",
  "api-level",
  "api-url",
  "config",
  "max-attempts",
  "retry-delay",
  "timeout",
  "temp",
  "temp-f",
  "duration",
]);

const SHORT_ALIASES: Record<string, string> = {
  u: "username",
  p: "password",
  c: "country",
  h: "help",
};

/**
 * Split argv into a command, its positionals, `--key value` options and
 * boolean flags. Global options may appear before or after the command.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const positionals: string[] = [];
  const options: Record<string, string> = {};
  const flags = new Set<string>();

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];

    if (token === "--") {
      positionals.push(...argv.slice(i + 1));
      break;
    }

    let key: string | undefined;
    let inlineValue: string | undefined;
    if (token.startsWith("--") && token.length > 2) {
      const body = token.slice(2);
      const eq = body.indexOf("=");
      key = eq === -1 ? body : body.slice(0, eq);
      inlineValue = eq === -1 ? undefined : body.slice(eq + 1);
    } else if (/^-[a-zA-Z]$/.test(token)) {
      const short = token.slice(1);
      key = SHORT_ALIASES[short];
      if (!key) {
        throw new Error(`Unknown option -${short}`);
      }
    }

    if (key === undefined) {
      positionals.push(token);
      continue;
    }

    if (!BOOLEAN_FLAGS.has(key) && !VALUE_OPTIONS.has(key)) {
      throw new Error(`Unknown option --${key}`);
    }

    if (BOOLEAN_FLAGS.has(key)) {
      if (inlineValue === undefined || inlineValue === "true") {
        flags.add(key);
      }
      continue;
    }

    if (inlineValue !== undefined) {
      options[key] = inlineValue;
      continue;
    }

    const next = argv[i + 1];
    if (next === undefined) {
      throw new Error(`Missing value for option --${key}`);
    }
    options[key] = next;
    i++;
  }

  const [command, ...rest] = positionals;
  return { command, positionals: rest, options, flags };
}
