import type { Logger } from "pino";
import { HttpVehicleServiceClient } from "../client/http-client.js";
import type { VehicleServiceClient } from "../client/vehicle-service.js";
import { ACTIONS, ACTION_NAMES, actionMessage, isActionName, type ActionName } from "../commands/actions.js";
import { CommandGate, type CommandRequest } from "../commands/command-gate.js";
import { DEFAULT_CONFIG_PATH, loadConfigFile, resolveSettings, type Settings } from "../config.js";
import { VehicleConnectError, errorMessage, toVehicleConnectError } from "../errors.js";
import defaultLogger from "../logger.js";
import { AuthSession, type SleepFn } from "../session/auth-session.js";
import type { ActionParams } from "../types.js";
import { parseArgs, type ParsedArgs } from "./args.js";
import { renderLoginFailure, renderOutcome, renderSection, renderVehicleList, renderVehicleStatus } from "./render.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CANCELLED = 130;

const QUERY_COMMANDS = {
  "list-vehicles": { description: "List all vehicles [--raw]", needsVin: false },
  status: { description: "Get vehicle status [--raw]", needsVin: true },
  "trip-data": { description: "Get trip data", needsVin: true },
} as const;

type QueryCommand = keyof typeof QUERY_COMMANDS;

type Target = { kind: "query"; command: QueryCommand } | { kind: "action"; request: CommandRequest };

function isQueryCommand(value: string): value is QueryCommand {
  return Object.hasOwn(QUERY_COMMANDS, value);
}

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
}

export interface RunDeps {
  env?: NodeJS.ProcessEnv;
  io?: CliIO;
  logger?: Logger;
  signal?: AbortSignal;
  sleep?: SleepFn;
  createClient?: (settings: Settings, logger: Logger) => VehicleServiceClient;
}

const consoleIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

function createHttpClient(settings: Settings, logger: Logger): VehicleServiceClient {
  return new HttpVehicleServiceClient({
    baseUrl: settings.apiUrl,
    apiLevel: settings.credentials.apiLevel,
    spin: settings.credentials.spin,
    timeoutMs: settings.timeoutMs,
    logger,
  });
}

export function usage(): string {
  const pad = (name: string) => name.padEnd(24);
  const lines = [
    "Usage: vehicle-connect [options] <command> [args]",
    "",
    "Options:",
    "  -u, --username <email>    Account username. Falls back to env and config.json",
    "  -p, --password <secret>   Account password",
    "  -c, --country <code>      Country code: DE, US, CA, CN",
    "  --spin <pin>              Security PIN for lock and pre-heater actions",
    "  --api-level <0|1>         API level (default 0)",
    "  --api-url <url>           Vehicle service base URL",
    "  --config <path>           Config file (default: config.json)",
    "  --max-attempts <n>        Login attempts before giving up (default 3)",
    "  --retry-delay <seconds>   Delay between login attempts (default 10)",
    "  --timeout <seconds>       Per-request timeout (default 30)",
    "  --json                    Print results as JSON",
    "  --debug                   Enable debug logging",
    "  -h, --help                Show this help",
    "",
    "Commands:",
    ...Object.entries(QUERY_COMMANDS).map(([name, q]) => `  ${pad(`${name}${q.needsVin ? " <vin>" : ""}`)}${q.description}`),
    ...ACTION_NAMES.map((name) => `  ${pad(`${name} <vin>${actionArgsHint(name)}`)}${ACTIONS[name].description}`),
    "",
    "climate-start options: --temp <C> --temp-f <F> --glass-heating --seat-fl --seat-fr --seat-rl --seat-rr",
    "                       --climatisation-at-unlock",
    "charge-start options:  --timer",
    "preheater-start:       --duration <minutes> (default 30)",
  ];
  return lines.join("\n");
}

function actionArgsHint(action: ActionName): string {
  if (action === "set-charge-target") return " <target>";
  if (action === "set-charging-mode") return " <mode>";
  return "";
}

/** Map parsed CLI input onto the raw, unvalidated params of an action. */
export function actionParamsFromArgs(action: ActionName, args: ParsedArgs): ActionParams {
  const flag = (name: string) => args.flags.has(name);
  switch (action) {
    case "climate-start":
      return {
        tempC: args.options.temp,
        tempF: args.options["temp-f"],
        glassHeating: flag("glass-heating"),
        seatFL: flag("seat-fl"),
        seatFR: flag("seat-fr"),
        seatRL: flag("seat-rl"),
        seatRR: flag("seat-rr"),
        climatisationAtUnlock: flag("climatisation-at-unlock"),
      };
    case "charge-start":
      return { timer: flag("timer") };
    case "set-charge-target":
      return { target: args.positionals[1] };
    case "set-charging-mode":
      return { mode: args.positionals[1] };
    case "preheater-start":
      return { duration: args.options.duration };
    default:
      return {};
  }
}

/** Only the caller's signal means the user cancelled; a request timeout also raises AbortError. */
function isCancelled(signal?: AbortSignal): boolean {
  return signal?.aborted === true;
}

/**
 * Resolve credentials, log in once, then run a single query or action.
 *
 * @returns The process exit code.
 */
export async function run(argv: string[], deps: RunDeps = {}): Promise<number> {
  const io = deps.io ?? consoleIO;
  const logger = deps.logger ?? defaultLogger;
  const env = deps.env ?? process.env;
  const { signal } = deps;

  let args: ParsedArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    io.err(`ERROR: ${errorMessage(err)}`);
    return EXIT_FAILURE;
  }

  const command = args.command;
  if (!command || args.flags.has("help")) {
    io.out(usage());
    return EXIT_OK;
  }
  if (!isQueryCommand(command) && !isActionName(command)) {
    io.err(`Unknown command: ${command}`);
    io.out(usage());
    return EXIT_FAILURE;
  }

  const debug = args.flags.has("debug");
  const json = args.flags.has("json");
  if (debug) {
    logger.level = "debug";
  }

  const vin = args.positionals[0] ?? "";
  const needsVin = isQueryCommand(command) ? QUERY_COMMANDS[command].needsVin : true;
  if (needsVin && vin === "") {
    io.err(`ERROR: <vin> is required for ${command}`);
    return EXIT_FAILURE;
  }

  try {
    const configPath = args.options.config ?? DEFAULT_CONFIG_PATH;
    const settings = resolveSettings(args, env, loadConfigFile(configPath, logger));

    if (debug) {
      io.err(`Using credentials from: ${settings.usernameSource}`);
      io.err(`Username: ${settings.credentials.identity}`);
      io.err(`Country: ${settings.credentials.region}`);
      io.err(`API Level: ${settings.credentials.apiLevel}`);
      io.err(`S-PIN configured: ${settings.credentials.spin ? "Yes" : "No"}`);
    }

    // Static action checks run before login so a missing S-PIN costs no network call.
    const gate = new CommandGate({ credentials: settings.credentials, logger });
    const target: Target = isActionName(command)
      ? { kind: "action", request: { vehicleId: vin, action: command, params: actionParamsFromArgs(command, args) } }
      : { kind: "query", command };
    const checkedParams: ActionParams = target.kind === "action" ? gate.check(target.request) : {};

    const client = (deps.createClient ?? createHttpClient)(settings, logger);
    const session = new AuthSession(client, settings.credentials, {
      maxAttempts: settings.maxAttempts,
      retryDelayMs: settings.retryDelayMs,
      logger,
      sleep: deps.sleep,
    });

    const login = await session.login({ signal });
    if (login.status !== "success") {
      io.err(renderLoginFailure(login, json));
      return EXIT_FAILURE;
    }

    if (target.kind === "query") {
      return await runQuery(target.command, vin, client, args, io, signal);
    }

    const { request } = target;
    const action = request.action;
    const def = ACTIONS[action];
    if (!json) {
      io.out(actionMessage(def, def.messages.progress, vin, checkedParams));
    }
    const outcome = await gate.execute(request, (params, requiresPin) =>
      client.executeAction(vin, action, params, { signal, requiresPin })
    );
    if (outcome.status === "failed" && isCancelled(signal)) {
      io.err("Operation cancelled by user");
      return EXIT_CANCELLED;
    }

    const rendered = renderOutcome(outcome, vin, checkedParams, json);
    if (outcome.status === "failed") {
      io.err(rendered);
      return EXIT_FAILURE;
    }
    io.out(rendered);
    return EXIT_OK;
  } catch (err) {
    if (isCancelled(signal)) {
      io.err("Operation cancelled by user");
      return EXIT_CANCELLED;
    }
    const error = toVehicleConnectError(err);
    logger.debug({ err: error.toJSON() }, "Command failed");
    if (err instanceof VehicleConnectError) {
      io.err(`ERROR: ${err.message}`);
      return EXIT_FAILURE;
    }
    io.err(`Error: ${error.message}`);
    if (debug && err instanceof Error && err.stack) {
      io.err(err.stack);
    }
    return EXIT_FAILURE;
  }
}

async function runQuery(
  command: QueryCommand,
  vin: string,
  client: VehicleServiceClient,
  args: ParsedArgs,
  io: CliIO,
  signal?: AbortSignal
): Promise<number> {
  const json = args.flags.has("json");
  const raw = args.flags.has("raw");

  switch (command) {
    case "list-vehicles": {
      const vehicles = await client.listVehicles({ signal });
      io.out(renderVehicleList(vehicles, raw, json));
      break;
    }
    case "status": {
      const status = await client.getVehicleStatus(vin, { signal });
      io.out(renderVehicleStatus(vin, status, raw, json));
      break;
    }
    case "trip-data": {
      const trips = await client.getTripData(vin, { signal });
      io.out(renderSection(`Trip Data ${vin}`, trips, json));
      break;
    }
  }
  return EXIT_OK;
}
