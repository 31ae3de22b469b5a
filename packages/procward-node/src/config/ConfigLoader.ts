/**
 * Configuration loader with hierarchy support
 * Priority: overrides > env vars > project config > defaults
 */

import {
  ConfigurationError,
  ExecutorConfigSchema,
  LogLevelSchema,
  errorMessage,
} from '@procward/core';
import type { ExecutorConfig, IFileSystem, ILogger } from '@procward/core';
import { z } from 'zod';
import yaml from 'yaml';
import path from 'path';
import dotenv from 'dotenv';
import { logger as defaultLogger } from '../shared/utils/logger.js';

export const PROJECT_CONFIG_FILE = 'procward.yml';
export const ENV_FILE = '.env';

/**
 * One layer of the hierarchy. No defaults: an absent key defers to the layer below.
 */
const ConfigLayerSchema = z
  .object({
    workingDirectory: z.string(),
    exitValues: z.array(z.number()).nullable(),
    watchdog: z.object({ timeoutMs: z.number() }).partial(),
    destroyOnShutdown: z.boolean(),
    streams: z.object({ stopTimeoutMs: z.number() }).partial(),
    logging: z.object({ level: LogLevelSchema, logDir: z.string() }).partial(),
  })
  .partial();

export type ConfigOverrides = z.infer<typeof ConfigLayerSchema>;

export interface ConfigLoadOptions {
  /**
   * Directory holding procward.yml and .env (default: cwd)
   */
  projectRoot?: string;
  overrides?: ConfigOverrides;
}

export interface ConfigLoaderOptions {
  /**
   * Environment to read PROCWARD_* variables from (default: process.env)
   */
  env?: NodeJS.ProcessEnv;
  logger?: ILogger;
}

export class ConfigLoader {
  private readonly env: NodeJS.ProcessEnv;
  private readonly logger: ILogger;

  constructor(
    private readonly fs: IFileSystem,
    options: ConfigLoaderOptions = {}
  ) {
    this.env = options.env ?? process.env;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Load configuration with full hierarchy:
   * 1. Defaults
   * 2. Project (procward.yml)
   * 3. Environment variables (process.env, then .env)
   * 4. Overrides
   */
  async load(options: ConfigLoadOptions = {}): Promise<ExecutorConfig> {
    const projectRoot = options.projectRoot ?? process.cwd();

    let config: ConfigOverrides = this.getDefaults();

    const projectConfig = await this.loadProjectConfig(projectRoot);
    if (projectConfig) {
      config = this.merge(config, projectConfig);
    }

    const envConfig = await this.loadEnvConfig(projectRoot);
    if (envConfig) {
      config = this.merge(config, envConfig);
    }

    if (options.overrides) {
      config = this.merge(config, this.parseLayer(options.overrides, 'overrides'));
    }

    return this.validate(config);
  }

  getDefaults(): ExecutorConfig {
    return ExecutorConfigSchema.parse({});
  }

  validate(config: unknown): ExecutorConfig {
    const result = ExecutorConfigSchema.safeParse(config);
    if (!result.success) {
      throw toConfigurationError('Invalid executor configuration', result.error);
    }
    return result.data;
  }

  private async loadProjectConfig(projectRoot: string): Promise<ConfigOverrides | null> {
    const configPath = path.join(projectRoot, PROJECT_CONFIG_FILE);
    if (!(await this.fs.exists(configPath))) {
      return null;
    }

    const content = await this.fs.readFile(configPath, 'utf-8');
    let parsed: unknown;
    try {
      parsed = yaml.parse(content);
    } catch (error) {
      throw new ConfigurationError(`Failed to parse ${configPath}: ${errorMessage(error)}`);
    }

    // An empty file parses to null
    if (parsed === null || parsed === undefined) {
      return null;
    }

    this.logger.debug('Loaded project config', { path: configPath });
    return this.parseLayer(parsed, configPath);
  }

  private async loadEnvConfig(projectRoot: string): Promise<ConfigOverrides | null> {
    const envPath = path.join(projectRoot, ENV_FILE);

    // Like dotenv.config(): variables already set in the environment win
    let vars: NodeJS.ProcessEnv = this.env;
    if (await this.fs.exists(envPath)) {
      const fileVars = dotenv.parse(await this.fs.readFile(envPath, 'utf-8'));
      vars = { ...fileVars, ...this.env };
      this.logger.debug('Loaded .env file', { path: envPath });
    }

    const envConfig: Record<string, unknown> = {};

    const workingDirectory = readVar(vars, 'PROCWARD_WORKING_DIRECTORY');
    if (workingDirectory !== undefined) {
      envConfig.workingDirectory = workingDirectory;
    }

    const exitValues = readVar(vars, 'PROCWARD_EXIT_VALUES');
    if (exitValues !== undefined) {
      envConfig.exitValues = parseExitValues(exitValues);
    }

    const timeoutMs = readVar(vars, 'PROCWARD_TIMEOUT_MS');
    if (timeoutMs !== undefined) {
      envConfig.watchdog = { timeoutMs: Number(timeoutMs) };
    }

    const destroyOnShutdown = readVar(vars, 'PROCWARD_DESTROY_ON_SHUTDOWN');
    if (destroyOnShutdown !== undefined) {
      envConfig.destroyOnShutdown = parseBoolean(destroyOnShutdown);
    }

    const stopTimeoutMs = readVar(vars, 'PROCWARD_STOP_TIMEOUT_MS');
    if (stopTimeoutMs !== undefined) {
      envConfig.streams = { stopTimeoutMs: Number(stopTimeoutMs) };
    }

    const level = readVar(vars, 'PROCWARD_LOG_LEVEL');
    const logDir = readVar(vars, 'PROCWARD_LOG_DIR');
    if (level !== undefined || logDir !== undefined) {
      envConfig.logging = {
        ...(level !== undefined && { level }),
        ...(logDir !== undefined && { logDir }),
      };
    }

    return Object.keys(envConfig).length > 0
      ? this.parseLayer(envConfig, 'environment variables')
      : null;
  }

  private parseLayer(layer: unknown, source: string): ConfigOverrides {
    const result = ConfigLayerSchema.safeParse(layer);
    if (!result.success) {
      throw toConfigurationError(`Invalid configuration in ${source}`, result.error);
    }
    return result.data;
  }

  private merge(base: ConfigOverrides, override: ConfigOverrides): ConfigOverrides {
    return {
      workingDirectory: override.workingDirectory ?? base.workingDirectory,
      // null is a meaningful value here, so only undefined falls through
      exitValues: override.exitValues !== undefined ? override.exitValues : base.exitValues,
      watchdog:
        base.watchdog || override.watchdog
          ? { ...base.watchdog, ...override.watchdog }
          : undefined,
      destroyOnShutdown: override.destroyOnShutdown ?? base.destroyOnShutdown,
      streams: { ...base.streams, ...override.streams },
      logging: { ...base.logging, ...override.logging },
    };
  }
}

function readVar(vars: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = vars[name]?.trim();
  return value === undefined || value === '' ? undefined : value;
}

function parseExitValues(value: string): number[] | null {
  if (value.toLowerCase() === 'none') {
    return null;
  }
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map(Number);
}

function parseBoolean(value: string): boolean | string {
  const normalized = value.toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  // Left as a string so validation reports it
  return value;
}

function toConfigurationError(message: string, error: z.ZodError): ConfigurationError {
  const issues = error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
  return new ConfigurationError(`${message}: ${issues.join('; ')}`, issues);
}
