/**
 * Helpers for building child process environments
 */

import { ConfigurationError } from '@procward/core';
import type { Environment } from '@procward/core';

/**
 * Snapshot of this process' environment, without unset entries
 */
export function getProcEnvironment(): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return env;
}

/**
 * Return a copy of `env` with one `KEY=value` assignment applied.
 * Only the first `=` separates key from value.
 */
export function addVariableToEnvironment(
  env: Environment,
  keyAndValue: string
): Record<string, string> {
  const [key, value] = parseEnvironmentVariable(keyAndValue);
  return { ...env, [key]: value };
}

function parseEnvironmentVariable(keyAndValue: string): [string, string] {
  const index = keyAndValue.indexOf('=');
  if (index === -1) {
    throw new ConfigurationError(
      `Environment variable for this platform must contain an equals sign ('='): ${keyAndValue}`
    );
  }
  const key = keyAndValue.slice(0, index);
  if (key.length === 0) {
    throw new ConfigurationError(`Environment variable has an empty name: ${keyAndValue}`);
  }
  return [key, keyAndValue.slice(index + 1)];
}
