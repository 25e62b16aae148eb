import pino, { type LevelWithSilent, type Logger } from "pino";

// stdout carries command output, so every log line goes to stderr.
const STDERR_FD = 2;

const LEVELS: readonly LevelWithSilent[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export function parseLogLevel(value: string | undefined, fallback: LevelWithSilent): LevelWithSilent {
  const normalized = value?.toLowerCase();
  return LEVELS.find((level) => level === normalized) ?? fallback;
}

export function createLogger(options: { level?: LevelWithSilent; pretty?: boolean } = {}): Logger {
  const level = options.level ?? parseLogLevel(process.env.LOG_LEVEL, "warn");
  const pretty = options.pretty ?? process.env.LOG_FORMAT !== "json";

  const base = {
    name: "vehicle-connect",
    level,
    redact: {
      paths: [
        "password",
        "secret",
        "spin",
        "token",
        "authorization",
        "headers.authorization",
        "*.password",
        "*.secret",
        "*.spin",
        "*.token",
      ],
      censor: "[REDACTED]",
    },
  };

  if (pretty) {
    return pino({
      ...base,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          destination: STDERR_FD,
        },
      },
    });
  }

  return pino(base, pino.destination(STDERR_FD));
}

const logger = createLogger();

export default logger;
