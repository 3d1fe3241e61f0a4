import { mkdirSync, existsSync, appendFileSync } from "fs";

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

export interface LoggerOptions {
  enabled: boolean;
  level: LogLevel;
  dir: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = { DEBUG: 10, INFO: 20, WARN: 30, ERROR: 40 };
const LOG_ENV_VAR = "CHAT_INSIGHTS_LOG";

let options: LoggerOptions = {
  enabled: process.env[LOG_ENV_VAR] === "1" || process.env[LOG_ENV_VAR] === "true",
  level: "INFO",
  dir: "/tmp/chat-insights",
};

export function configureLogger(next: Partial<LoggerOptions>): void {
  options = { ...options, ...next };
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) return arg.stack ?? arg.message;
  return typeof arg === "object" ? JSON.stringify(arg) : String(arg);
}

function writeToFile(level: LogLevel, ...args: unknown[]): void {
  if (!options.enabled || LEVEL_ORDER[level] < LEVEL_ORDER[options.level]) return;

  try {
    if (!existsSync(options.dir)) {
      mkdirSync(options.dir, { recursive: true });
    }
    const timestamp = new Date().toISOString();
    const msg = args.map(formatArg).join(" ");
    appendFileSync(`${options.dir}/${level.toLowerCase()}.log`, `[${timestamp}] ${msg}\n`);
  } catch (error) {
    console.error("[logger] write failed:", formatArg(error));
  }
}

// stdout carries JSON-RPC when serving over stdio; only stderr and files are used here.
export const logger = {
  error: (...args: unknown[]): void => {
    console.error(...args);
    writeToFile("ERROR", ...args);
  },

  warn: (...args: unknown[]): void => {
    writeToFile("WARN", ...args);
  },

  info: (...args: unknown[]): void => {
    writeToFile("INFO", ...args);
  },

  debug: (...args: unknown[]): void => {
    writeToFile("DEBUG", ...args);
  },
};
