import fs from "node:fs";
import path from "node:path";
import type { Logger } from "pino";
import { z } from "zod";
import type { ParsedArgs } from "./cli/args.js";
import { DEFAULT_TIMEOUT_MS } from "./client/http-client.js";
import { ConfigError, errorMessage } from "./errors.js";
import defaultLogger from "./logger.js";
import { DEFAULT_MAX_ATTEMPTS, DEFAULT_RETRY_DELAY_MS } from "./session/auth-session.js";
import { REGIONS, type ApiLevel, type Credentials } from "./types.js";

export const DEFAULT_CONFIG_PATH = "config.json";

export const ENV_KEYS = {
  username: "VEHICLE_CONNECT_USERNAME",
  password: "VEHICLE_CONNECT_PASSWORD",
  country: "VEHICLE_CONNECT_COUNTRY",
  spin: "VEHICLE_CONNECT_SPIN",
  apiLevel: "VEHICLE_CONNECT_API_LEVEL",
  apiUrl: "VEHICLE_CONNECT_API_URL",
} as const;

// ---------------------------------------------------------------------------
// Config file
// ---------------------------------------------------------------------------

const FileConfigSchema = z.object({
  username: z.string().optional(),
  password: z.string().optional(),
  country: z.string().optional(),
  // JSON authors tend to write the PIN as a number.
  spin: z.union([z.string(), z.number().int()]).transform(String).optional(),
  api_level: z.number().int().optional(),
  api_url: z.string().optional(),
  max_attempts: z.number().optional(),
  retry_delay: z.number().optional(),
  timeout: z.number().optional(),
});

export type FileConfig = z.infer<typeof FileConfigSchema>;

/**
 * Read the JSON config file. A missing or unreadable file yields no
 * defaults; a readable file with wrongly typed keys is a {@link ConfigError}.
 */
export function loadConfigFile(configPath: string, logger: Logger = defaultLogger): FileConfig {
  const absPath = path.resolve(process.cwd(), configPath);
  if (!fs.existsSync(absPath)) {
    logger.debug({ path: absPath }, "No config file found");
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(absPath, "utf-8"));
  } catch (err) {
    logger.warn({ path: absPath, err: errorMessage(err) }, "Failed to load config file");
    return {};
  }

  const parsed = FileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid config file ${absPath}: ${details}`, { path: absPath });
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

export type ConfigSource = "command-line" | "environment" | "config file" | "default";

type Candidate = string | number | undefined;

function pick(...candidates: Array<[Candidate, ConfigSource]>): { value: Candidate; source: ConfigSource } {
  for (const [value, source] of candidates) {
    if (value !== undefined && value !== "") {
      return { value, source };
    }
  }
  return { value: undefined, source: "default" };
}

const ApiLevelSchema = z.coerce
  .number()
  .refine((n): n is ApiLevel => n === 0 || n === 1, "api level must be 0 or 1");

const SettingsSchema = z.object({
  username: z.string(),
  password: z.string(),
  country: z.enum(REGIONS, {
    errorMap: () => ({ message: `country must be one of ${REGIONS.join(", ")}` }),
  }),
  spin: z.coerce.string().optional(),
  apiLevel: ApiLevelSchema.default(0),
  apiUrl: z
    .string()
    .url("api url must be a valid URL")
    .transform((url) => url.replace(/\/+$/, "")),
  maxAttempts: z.coerce.number().int().min(1, "max attempts must be at least 1").default(DEFAULT_MAX_ATTEMPTS),
  retryDelaySeconds: z.coerce.number().min(0, "retry delay cannot be negative").default(DEFAULT_RETRY_DELAY_MS / 1000),
  timeoutSeconds: z.coerce.number().positive("timeout must be positive").default(DEFAULT_TIMEOUT_MS / 1000),
});

export interface Settings {
  credentials: Credentials;
  apiUrl: string;
  maxAttempts: number;
  retryDelayMs: number;
  timeoutMs: number;
  usernameSource: ConfigSource;
}

const REQUIRED: ReadonlyArray<{ key: "username" | "password" | "country" | "apiUrl"; flag: string }> = [
  { key: "username", flag: "--username" },
  { key: "password", flag: "--password" },
  { key: "country", flag: "--country" },
  { key: "apiUrl", flag: "--api-url" },
];

/**
 * Merge command-line options over environment variables over the config
 * file. An explicit value always wins over a default.
 */
export function resolveSettings(args: ParsedArgs, env: NodeJS.ProcessEnv, file: FileConfig): Settings {
  const opt = args.options;
  const username = pick([opt.username, "command-line"], [env[ENV_KEYS.username], "environment"], [file.username, "config file"]);

  const merged = {
    username: username.value,
    password: pick([opt.password, "command-line"], [env[ENV_KEYS.password], "environment"], [file.password, "config file"]).value,
    country: pick([opt.country, "command-line"], [env[ENV_KEYS.country], "environment"], [file.country, "config file"]).value,
    spin: pick([opt.spin, "command-line"], [env[ENV_KEYS.spin], "environment"], [file.spin, "config file"]).value,
    apiLevel: pick([opt["api-level"], "command-line"], [env[ENV_KEYS.apiLevel], "environment"], [file.api_level, "config file"]).value,
    apiUrl: pick([opt["api-url"], "command-line"], [env[ENV_KEYS.apiUrl], "environment"], [file.api_url, "config file"]).value,
    maxAttempts: pick([opt["max-attempts"], "command-line"], [file.max_attempts, "config file"]).value,
    retryDelaySeconds: pick([opt["retry-delay"], "command-line"], [file.retry_delay, "config file"]).value,
    timeoutSeconds: pick([opt.timeout, "command-line"], [file.timeout, "config file"]).value,
  };

  const missing = REQUIRED.filter(({ key }) => merged[key] === undefined);
  if (missing.length > 0) {
    const names = missing.map(({ key }) => key).join(", ");
    const flags = missing.map(({ flag }) => flag).join(", ");
    throw new ConfigError(
      `Missing required credentials: ${names}. Provide them via ${flags}, environment variables or the config file.`,
      { missing: missing.map(({ key }) => key) }
    );
  }

  const parsed = SettingsSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
  }

  const s = parsed.data;
  const credentials: Credentials = Object.freeze({
    identity: s.username,
    secret: s.password,
    region: s.country,
    spin: s.spin,
    apiLevel: s.apiLevel,
  });

  return {
    credentials,
    apiUrl: s.apiUrl,
    maxAttempts: s.maxAttempts,
    retryDelayMs: Math.round(s.retryDelaySeconds * 1000),
    timeoutMs: Math.round(s.timeoutSeconds * 1000),
    usernameSource: username.source,
  };
}
