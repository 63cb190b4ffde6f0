/**
 * Configuration loading and validation utilities.
 *
 * The configuration is layered: built-in defaults, then the JSON config file
 * (when one is found or given), then environment variables. The merged value
 * is validated against schemas/config.schema.json and deep-frozen.
 */

import { readFileSync } from 'node:fs';
import { access } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import AjvModule from 'ajv';
import type { SchemaObject, ValidateFunction } from 'ajv';
import type { WatchdogConfig } from '../types/config.js';
import { atomicReadJson, AtomicFsError } from './fs.js';

/** Default configuration file name */
export const CONFIG_FILE_NAME = 'ovpn-watchdog.config.json';

/** Environment variable naming an explicit config file */
export const CONFIG_PATH_ENV = 'OVPN_WATCHDOG_CONFIG';

const SCHEMA_URL = new URL('../../schemas/config.schema.json', import.meta.url);

/**
 * Error thrown when configuration loading or validation fails.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath?: string,
    public readonly cause?: Error,
    public readonly details: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Built-in defaults, matching the reference deployment.
 */
export const DEFAULT_CONFIG: WatchdogConfig = {
  version: '1.0',
  management: {
    host: '127.0.0.1',
    port: 38248,
    status_command: 'status',
    load_stats_command: 'load-stats',
    timeout_seconds: 15,
  },
  service: {
    name: 'openvpn-server@hd',
    systemctl_command: 'systemctl',
    command_timeout_seconds: 15,
  },
  state: {
    path: '/var/lib/ovpn-watchdog/last_status.json',
    hash_algorithm: 'md5',
    lock_timeout_seconds: 10,
  },
  log: {
    path: '/var/log/ovpn-watchdog.log',
  },
  policy: {
    on_unreachable: 'recover',
  },
  email: {
    enabled: false,
    smtp_host: 'localhost',
    smtp_port: 587,
    security: 'starttls',
    from: 'ovpn-watchdog@localhost',
    recipients: [],
  },
};

type EnvKind = 'string' | 'integer' | 'number' | 'boolean' | 'list';

interface EnvBinding {
  variable: string;
  path: readonly [string, string];
  kind: EnvKind;
}

/**
 * Environment variables recognised as configuration overrides.
 */
export const ENV_BINDINGS: readonly EnvBinding[] = [
  { variable: 'OVPN_MGMT_HOST', path: ['management', 'host'], kind: 'string' },
  { variable: 'OVPN_MGMT_PORT', path: ['management', 'port'], kind: 'integer' },
  { variable: 'OVPN_MGMT_PASSWORD', path: ['management', 'password'], kind: 'string' },
  { variable: 'OVPN_MGMT_TIMEOUT', path: ['management', 'timeout_seconds'], kind: 'number' },
  { variable: 'OVPN_SERVICE', path: ['service', 'name'], kind: 'string' },
  { variable: 'OVPN_WATCHDOG_STATE', path: ['state', 'path'], kind: 'string' },
  { variable: 'OVPN_WATCHDOG_LOG', path: ['log', 'path'], kind: 'string' },
  { variable: 'OVPN_ON_UNREACHABLE', path: ['policy', 'on_unreachable'], kind: 'string' },
  { variable: 'EMAIL_ENABLED', path: ['email', 'enabled'], kind: 'boolean' },
  { variable: 'SMTP_HOST', path: ['email', 'smtp_host'], kind: 'string' },
  { variable: 'SMTP_PORT', path: ['email', 'smtp_port'], kind: 'integer' },
  { variable: 'SMTP_SECURITY', path: ['email', 'security'], kind: 'string' },
  { variable: 'SMTP_USERNAME', path: ['email', 'username'], kind: 'string' },
  { variable: 'SMTP_PASSWORD', path: ['email', 'password'], kind: 'string' },
  { variable: 'EMAIL_FROM', path: ['email', 'from'], kind: 'string' },
  { variable: 'EMAIL_RECIPIENTS', path: ['email', 'recipients'], kind: 'list' },
];

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseEnvValue(binding: EnvBinding, raw: string): unknown {
  switch (binding.kind) {
    case 'string':
      return raw;
    case 'integer': {
      if (!/^-?\d+$/.test(raw)) {
        throw new ConfigError(`${binding.variable} must be an integer, got '${raw}'`);
      }
      return Number.parseInt(raw, 10);
    }
    case 'number': {
      const value = Number(raw);
      if (!Number.isFinite(value)) {
        throw new ConfigError(`${binding.variable} must be a number, got '${raw}'`);
      }
      return value;
    }
    case 'boolean': {
      const normalized = raw.toLowerCase();
      if (TRUE_VALUES.has(normalized)) return true;
      if (FALSE_VALUES.has(normalized)) return false;
      throw new ConfigError(`${binding.variable} must be a boolean (true/false), got '${raw}'`);
    }
    case 'list':
      return raw.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
  }
}

/**
 * Builds the partial configuration contributed by environment variables.
 *
 * Unset and empty variables contribute nothing.
 *
 * @throws {ConfigError} If a variable cannot be parsed as its option's type
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): Record<string, Record<string, unknown>> {
  const overrides: Record<string, Record<string, unknown>> = {};
  for (const binding of ENV_BINDINGS) {
    const raw = env[binding.variable]?.trim();
    if (raw === undefined || raw === '') {
      continue;
    }
    const [section, key] = binding.path;
    const target = overrides[section] ?? (overrides[section] = {});
    target[key] = parseEnvValue(binding, raw);
  }
  return overrides;
}

/**
 * Deep-merges plain objects; arrays and scalars in `overlay` replace those in `base`.
 */
export function mergeLayers(base: object, overlay: object): Record<string, unknown> {
  const result: Record<string, unknown> = Object.fromEntries(Object.entries(base));
  for (const [key, value] of Object.entries(overlay)) {
    if (value === undefined) {
      continue;
    }
    const current = result[key];
    result[key] = isRecord(current) && isRecord(value) ? mergeLayers(current, value) : value;
  }
  return result;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

let cachedValidator: ValidateFunction<WatchdogConfig> | null = null;

function getValidator(): ValidateFunction<WatchdogConfig> {
  if (cachedValidator) {
    return cachedValidator;
  }
  const schema: SchemaObject = JSON.parse(readFileSync(SCHEMA_URL, 'utf-8'));
  const Ajv = AjvModule.default;
  const ajv = new Ajv({ strict: true, allErrors: true });
  cachedValidator = ajv.compile<WatchdogConfig>(schema);
  return cachedValidator;
}

function formatSchemaErrors(errors: ValidateFunction['errors']): string[] {
  return (errors ?? []).map((error) => {
    const path = error.instancePath || '(root)';
    return `${path}: ${error.message ?? 'invalid'}`;
  });
}

/**
 * Validates that an object conforms to the WatchdogConfig schema.
 */
export function validateConfig(config: unknown): config is WatchdogConfig {
  return getValidator()(config);
}

/**
 * Searches for a configuration file by walking upward from the current directory.
 * Stops at the filesystem root if not found.
 *
 * @returns Path to the config file if found, null otherwise
 */
export async function findConfigFile(startDir: string = process.cwd()): Promise<string | null> {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    try {
      await access(configPath);
      return configPath;
    } catch {
      // Not here; keep walking up
    }

    const parent = dirname(currentDir);
    if (parent === currentDir) {
      return null;
    }
    currentDir = parent;
  }
}

async function readConfigFile(path: string): Promise<Record<string, unknown>> {
  let raw: unknown;
  try {
    raw = await atomicReadJson(path);
  } catch (error) {
    if (error instanceof AtomicFsError) {
      throw new ConfigError(`Failed to read configuration file: ${error.message}`, path, error);
    }
    throw error;
  }
  if (!isRecord(raw)) {
    throw new ConfigError('Invalid configuration file: expected a JSON object', path);
  }
  return raw;
}

/**
 * Options for {@link loadConfig}.
 */
export interface LoadConfigOptions {
  /** Explicit config file; a missing file is an error */
  configPath?: string;
  /** Environment to read overrides from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Directory the config file search starts from (defaults to cwd) */
  searchFrom?: string;
}

/**
 * Result of {@link loadConfig}.
 */
export interface LoadedConfig {
  config: WatchdogConfig;
  /** Config file that contributed, null when only defaults and env were used */
  source: string | null;
}

/**
 * Loads, layers, validates and freezes the configuration.
 *
 * Without an explicit path (`configPath` or OVPN_WATCHDOG_CONFIG) the file is
 * optional: defaults and environment variables alone form a valid config.
 *
 * @throws {ConfigError} If the file cannot be read or the result is invalid
 *
 * @example
 * ```typescript
 * const { config } = await loadConfig({ configPath: '/etc/ovpn-watchdog.config.json' });
 * ```
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const env = options.env ?? process.env;
  const explicitPath = options.configPath ?? (env[CONFIG_PATH_ENV] || undefined);

  let source: string | null;
  if (explicitPath) {
    source = resolve(explicitPath);
  } else {
    source = await findConfigFile(options.searchFrom);
  }

  const fileLayer = source ? await readConfigFile(source) : {};
  const merged = mergeLayers(mergeLayers(structuredClone(DEFAULT_CONFIG), fileLayer), readEnvOverrides(env));

  const validate = getValidator();
  if (!validate(merged)) {
    const errors = formatSchemaErrors(validate.errors);
    throw new ConfigError(
      `Invalid configuration: ${errors.join('; ')}`,
      source ?? undefined,
      undefined,
      errors
    );
  }

  return { config: deepFreeze(merged), source };
}
