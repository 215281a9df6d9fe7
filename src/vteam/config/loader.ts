/**
 * Configuration loading and validation
 */

import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import YAML from "yaml";
import { type VteamConfig, VteamConfigSchema, getDefaultConfig } from "./types.js";
import { VteamError, VteamErrorCode } from "../runtime/errors.js";

/** Default config directory */
export const DEFAULT_CONFIG_DIR = path.join(os.homedir(), ".vteam");

/** Default config file name */
export const CONFIG_FILE_NAME = "config.yaml";

/** Environment variable for config path override */
export const VTEAM_CONFIG_PATH_ENV = "VTEAM_CONFIG_PATH";

/** Environment variable for config directory override */
export const VTEAM_CONFIG_DIR_ENV = "VTEAM_CONFIG_DIR";

/**
 * Get the configuration directory path
 */
export function getConfigDir(): string {
  return process.env[VTEAM_CONFIG_DIR_ENV] || DEFAULT_CONFIG_DIR;
}

/**
 * Get the configuration file path
 */
export function getConfigPath(): string {
  const override = process.env[VTEAM_CONFIG_PATH_ENV];
  if (override) {
    return override;
  }
  return path.join(getConfigDir(), CONFIG_FILE_NAME);
}

/**
 * Check if config file exists
 */
export async function configExists(): Promise<boolean> {
  try {
    await fs.access(getConfigPath());
    return true;
  } catch {
    return false;
  }
}

function parsePositive(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return ["1", "true", "yes", "y", "on"].includes(value.trim().toLowerCase());
}

/**
 * Apply environment overrides on top of a parsed config
 */
export function applyEnvOverrides(
  config: VteamConfig,
  env: NodeJS.ProcessEnv = process.env,
): VteamConfig {
  const timeoutS = parsePositive(env.VTEAM_CODING_CLI_TIMEOUT);
  const shared = parseFlag(env.VTEAM_SHARED_CONTEXT);

  return {
    ...config,
    dispatch: {
      ...config.dispatch,
      command: env.VTEAM_CODING_CLI_COMMAND || config.dispatch.command,
      debugCommand: env.VTEAM_DEBUG_CLI_COMMAND || config.dispatch.debugCommand,
      reviewCommand: env.VTEAM_REVIEW_CLI_COMMAND || config.dispatch.reviewCommand,
      timeoutS: timeoutS ?? config.dispatch.timeoutS,
    },
    policy: {
      ...config.policy,
      default: env.VTEAM_MODEL_POLICY || config.policy.default,
    },
    workflow: {
      ...config.workflow,
      workspaceRoot: env.VTEAM_WORKSPACE_ROOT || config.workflow.workspaceRoot,
    },
    sharedContext: {
      ...config.sharedContext,
      enabled: shared ?? config.sharedContext.enabled,
    },
  };
}

/**
 * Load configuration from file
 */
export async function loadConfig(): Promise<VteamConfig> {
  const configPath = getConfigPath();

  try {
    const content = await fs.readFile(configPath, "utf-8");
    const parsed: unknown = YAML.parse(content);
    return applyEnvOverrides(VteamConfigSchema.parse(parsed ?? {}));
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      // Return default config if file doesn't exist
      return applyEnvOverrides(getDefaultConfig());
    }
    throw new VteamError(
      VteamErrorCode.CONFIG_INVALID,
      `Failed to load config from ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

/**
 * Save configuration to file
 */
export async function saveConfig(config: VteamConfig): Promise<void> {
  const configPath = getConfigPath();

  await fs.mkdir(path.dirname(configPath), { recursive: true });

  // Validate before saving
  const validated = VteamConfigSchema.parse(config);
  await fs.writeFile(configPath, YAML.stringify(validated, { indent: 2 }), "utf-8");
}

/**
 * Initialize configuration with defaults
 */
export async function initConfig(options?: {
  codingCommand?: string;
  workspaceRoot?: string;
  /** Overwrite an existing file */
  force?: boolean;
}): Promise<{ configPath: string; config: VteamConfig }> {
  const configPath = getConfigPath();

  if (!options?.force && (await configExists())) {
    throw new Error(`Config already exists at ${configPath}`);
  }

  const config = getDefaultConfig();
  if (options?.codingCommand) {
    config.dispatch.command = options.codingCommand;
  }
  if (options?.workspaceRoot) {
    config.workflow.workspaceRoot = path.resolve(options.workspaceRoot);
  }

  await saveConfig(config);

  return { configPath, config };
}
