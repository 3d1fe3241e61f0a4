/**
 * Settings management: defaults, overridden by the JSON settings file, overridden
 * by CHAT_INSIGHTS_* environment variables.
 */

import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { homedir } from "os";
import { z } from "zod";
import { logger, type LogLevel } from "../utils/logger.js";

export interface Settings {
  database: {
    path: string;
    busyTimeoutMs: number;
    ensureSchema: boolean;
  };
  logging: {
    enabled: boolean;
    level: LogLevel;
    dir: string;
  };
}

const DATA_DIR = join(homedir(), ".local", "share", "chat-insights");
const SETTINGS_FILE = join(DATA_DIR, "settings.json");

const DEFAULT_SETTINGS: Settings = {
  database: {
    path: join(DATA_DIR, "messages.db"),
    busyTimeoutMs: 5000,
    ensureSchema: true,
  },
  logging: {
    enabled: false,
    level: "INFO",
    dir: "/tmp/chat-insights",
  },
};

const logLevelSchema = z.enum(["DEBUG", "INFO", "WARN", "ERROR"]);

const fileSchema = z.object({
  database: z
    .object({
      path: z.string().min(1),
      busyTimeoutMs: z.number().int().nonnegative(),
      ensureSchema: z.boolean(),
    })
    .partial()
    .optional(),
  logging: z
    .object({
      enabled: z.boolean(),
      level: logLevelSchema,
      dir: z.string().min(1),
    })
    .partial()
    .optional(),
});

type FileSettings = z.infer<typeof fileSchema>;

export interface LoadSettingsOptions {
  file?: string;
  env?: NodeJS.ProcessEnv;
}

function readSettingsFile(file: string): FileSettings {
  if (!existsSync(file)) return {};

  try {
    const parsed = fileSchema.safeParse(JSON.parse(readFileSync(file, "utf-8")));
    if (parsed.success) return parsed.data;
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    logger.warn(`[settings] ignoring invalid ${file}:`, issues.join("; "));
  } catch (error) {
    logger.warn(`[settings] ignoring unreadable ${file}:`, error instanceof Error ? error.message : error);
  }
  return {};
}

export function loadSettings(options: LoadSettingsOptions = {}): Settings {
  const env = options.env ?? process.env;
  const file = options.file ?? env.CHAT_INSIGHTS_SETTINGS ?? SETTINGS_FILE;
  const fileSettings = readSettingsFile(file);

  const getEnvBool = (key: string, fallback: boolean): boolean => {
    const val = env[key];
    if (val === undefined) return fallback;
    return val.toLowerCase() === "true" || val === "1";
  };

  const getEnvNumber = (key: string, fallback: number): number => {
    const val = env[key];
    if (val === undefined) return fallback;
    const parsed = parseInt(val, 10);
    return Number.isNaN(parsed) ? fallback : parsed;
  };

  const getEnvString = (key: string, fallback: string): string => env[key] || fallback;

  const getEnvLevel = (key: string, fallback: LogLevel): LogLevel => {
    const parsed = logLevelSchema.safeParse(env[key]?.toUpperCase());
    return parsed.success ? parsed.data : fallback;
  };

  return {
    database: {
      path: getEnvString("CHAT_INSIGHTS_DB_PATH", fileSettings.database?.path ?? DEFAULT_SETTINGS.database.path),
      busyTimeoutMs: getEnvNumber("CHAT_INSIGHTS_DB_BUSY_TIMEOUT", fileSettings.database?.busyTimeoutMs ?? DEFAULT_SETTINGS.database.busyTimeoutMs),
      ensureSchema: getEnvBool("CHAT_INSIGHTS_ENSURE_SCHEMA", fileSettings.database?.ensureSchema ?? DEFAULT_SETTINGS.database.ensureSchema),
    },
    logging: {
      enabled: getEnvBool("CHAT_INSIGHTS_LOG", fileSettings.logging?.enabled ?? DEFAULT_SETTINGS.logging.enabled),
      level: getEnvLevel("CHAT_INSIGHTS_LOG_LEVEL", fileSettings.logging?.level ?? DEFAULT_SETTINGS.logging.level),
      dir: getEnvString("CHAT_INSIGHTS_LOG_DIR", fileSettings.logging?.dir ?? DEFAULT_SETTINGS.logging.dir),
    },
  };
}

export { DEFAULT_SETTINGS, SETTINGS_FILE };
