import config from 'config';
import { z } from 'zod';
import { log, LogLevel } from './logger';
import { TaskListPreferencesSchema } from './tasklist/preferences';

// These should match the structure of the config files (config/default.json etc.)

const LoggingConfigSchema = z.object({
  consoleLogLevel: z.nativeEnum(LogLevel).default(LogLevel.INFO),
  fileLogLevel: z.nativeEnum(LogLevel).default(LogLevel.INFO),
  logFile: z.string().nullable().default(null),
  consoleQuietMode: z.boolean().default(false),
});

const NotebookConfigSchema = z.object({
  root: z.string().default('notebook'),
  dbPath: z.string().default('database/tasklist.sqlite3'),
});

const AppConfigSchema = z.object({
  appName: z.string().default('tasklist'),
  logging: LoggingConfigSchema.default({}),
  notebook: NotebookConfigSchema.default({}),
  tasklist: TaskListPreferencesSchema.default({}),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type NotebookConfig = z.infer<typeof NotebookConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Loads the application configuration using the 'config' package, which
 * merges config/default.json, the NODE_ENV file and the environment variables
 * mapped in custom-environment-variables.json.
 */
export function loadConfig(): AppConfig {
  const result = AppConfigSchema.safeParse(config.util.toObject());
  if (!result.success) {
    log(LogLevel.ERROR, 'Invalid configuration:', result.error.flatten().fieldErrors);
    throw new Error(`Invalid configuration: ${result.error.message}`);
  }

  log(LogLevel.DEBUG, 'Application Config Loaded:', { appConfig: result.data });
  return result.data;
}
