import { pino, type Logger } from "pino";

// JSON lines on stdout; LOG_LEVEL overrides the level chosen by initLogger.
let sink: Logger = pino({ name: "memory-tiers", level: process.env.LOG_LEVEL ?? "info" });
let debugEnabled = false;

export function initLogger(options: { debug: boolean; destination?: Logger }): void {
  debugEnabled = options.debug;
  if (options.destination) {
    sink = options.destination;
  } else if (!process.env.LOG_LEVEL) {
    sink.level = options.debug ? "debug" : "info";
  }
}

function detail(args: unknown[]): Record<string, unknown> | undefined {
  if (args.length === 0) return undefined;
  const [first] = args;
  if (first instanceof Error) return { err: first };
  return { detail: args.length === 1 ? first : args };
}

function emit(level: "debug" | "info" | "warn" | "error", msg: string, args: unknown[]): void {
  const obj = detail(args);
  if (obj) {
    sink[level](obj, msg);
  } else {
    sink[level](msg);
  }
}

export const log = {
  debug(msg: string, ...args: unknown[]): void {
    if (!debugEnabled) return;
    emit("debug", msg, args);
  },
  info(msg: string, ...args: unknown[]): void {
    emit("info", msg, args);
  },
  warn(msg: string, ...args: unknown[]): void {
    emit("warn", msg, args);
  },
  error(msg: string, ...args: unknown[]): void {
    emit("error", msg, args);
  },
};
