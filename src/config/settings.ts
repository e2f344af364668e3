/**
 * Runtime settings
 *
 * Resolves the config file location and scan defaults from environment
 * variables. Blank variables are treated as unset.
 *
 * @module config/settings
 */

import os from 'os';
import path from 'path';
import { ConfigError } from '../errors/config-error';
import { formatZodIssue } from '../validation/errors';
import { resolveUserPath } from '../validation/common';
import { HolsterEnvironmentSchema } from '../validation/schemas/settings-schema';

export const CONFIG_FILE_NAME = 'claude_desktop_config.json';
export const DEFAULT_SCAN_MAX_DEPTH = 2;
export const DEFAULT_SCAN_TIMEOUT_MS = 30_000;

const SETTINGS_ENV_VARS = [
  'HOLSTER_CONFIG_PATH',
  'HOLSTER_HOME_DIR',
  'HOLSTER_SCAN_MAX_DEPTH',
  'HOLSTER_SCAN_TIMEOUT_MS',
] as const;

export interface HolsterSettings {
  /** JSON document holding the active and inactive server maps */
  configPath: string;
  /** Home directory searched by common-location discovery */
  homeDir: string;
  scanMaxDepth: number;
  /** Default deadline for one scan call; 0 disables it */
  scanTimeoutMs: number;
}

export type DiscoverySettings = Pick<HolsterSettings, 'homeDir' | 'scanMaxDepth' | 'scanTimeoutMs'>;

export interface PlatformInfo {
  platform: NodeJS.Platform;
  homeDir: string;
  env: NodeJS.ProcessEnv;
}

/**
 * Location of the Claude Desktop config file for the given platform.
 */
export function defaultConfigPath(info: PlatformInfo): string {
  switch (info.platform) {
    case 'darwin':
      return path.join(info.homeDir, 'Library', 'Application Support', 'Claude', CONFIG_FILE_NAME);
    case 'win32': {
      const appData = info.env.APPDATA?.trim() || path.join(info.homeDir, 'AppData', 'Roaming');
      return path.join(appData, 'Claude', CONFIG_FILE_NAME);
    }
    default: {
      const configHome = info.env.XDG_CONFIG_HOME?.trim() || path.join(info.homeDir, '.config');
      return path.join(configHome, 'Claude', CONFIG_FILE_NAME);
    }
  }
}

export function loadSettings(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): HolsterSettings {
  const present: Record<string, string> = {};
  for (const key of SETTINGS_ENV_VARS) {
    const value = env[key];
    if (value !== undefined && value.trim().length > 0) {
      present[key] = value;
    }
  }

  const parsed = HolsterEnvironmentSchema.safeParse(present);
  if (!parsed.success) {
    const messages = parsed.error.issues.map((issue) => formatZodIssue(issue));
    throw new ConfigError(`Invalid settings: ${messages.join('; ')}`, {
      context: { module: 'config', data: { messages } },
      cause: parsed.error,
    });
  }

  const values = parsed.data;
  const homeDir = values.HOLSTER_HOME_DIR
    ? resolveUserPath(values.HOLSTER_HOME_DIR)
    : os.homedir();
  const configPath = values.HOLSTER_CONFIG_PATH
    ? resolveUserPath(values.HOLSTER_CONFIG_PATH, homeDir)
    : defaultConfigPath({ platform, homeDir, env });

  return {
    configPath,
    homeDir,
    scanMaxDepth: values.HOLSTER_SCAN_MAX_DEPTH ?? DEFAULT_SCAN_MAX_DEPTH,
    scanTimeoutMs: values.HOLSTER_SCAN_TIMEOUT_MS ?? DEFAULT_SCAN_TIMEOUT_MS,
  };
}
