/**
 * Source configuration: defaults, overrides and environment variables.
 */

import Debug from 'debug';
import { HOLE_PUNCH_CONSTANTS } from './constants';
import type { HolePunchConfig } from './types';

const debug = Debug('holepunch-source:config');

export function resolveSourceConfig(overrides: Partial<HolePunchConfig> = {}): HolePunchConfig {
  const defaults = HOLE_PUNCH_CONSTANTS.DEFAULT_CONFIG;
  const config: HolePunchConfig = {
    deadlineMs: overrides.deadlineMs ?? defaults.deadlineMs,
    retryIntervalMs: overrides.retryIntervalMs ?? defaults.retryIntervalMs,
    connectTimeoutMs: overrides.connectTimeoutMs ?? defaults.connectTimeoutMs,
    authTimeoutMs: overrides.authTimeoutMs ?? defaults.authTimeoutMs,
    controlTimeoutMs: overrides.controlTimeoutMs ?? defaults.controlTimeoutMs,
    bindOutbound: overrides.bindOutbound ?? defaults.bindOutbound
  };

  if (config.retryIntervalMs < HOLE_PUNCH_CONSTANTS.MIN_RETRY_INTERVAL) {
    debug(`Retry interval ${config.retryIntervalMs}ms raised to ${HOLE_PUNCH_CONSTANTS.MIN_RETRY_INTERVAL}ms`);
    config.retryIntervalMs = HOLE_PUNCH_CONSTANTS.MIN_RETRY_INTERVAL;
  }

  return config;
}

function parseMillis(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;

  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < 0) {
    debug(`Ignoring invalid ${name}: ${raw}`);
    return undefined;
  }
  return value;
}

/**
 * Read overrides from HOLE_PUNCH_* environment variables
 */
export function loadSourceConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<HolePunchConfig> {
  return {
    deadlineMs: parseMillis(env, 'HOLE_PUNCH_DEADLINE_MS'),
    retryIntervalMs: parseMillis(env, 'HOLE_PUNCH_RETRY_INTERVAL_MS'),
    connectTimeoutMs: parseMillis(env, 'HOLE_PUNCH_CONNECT_TIMEOUT_MS'),
    authTimeoutMs: parseMillis(env, 'HOLE_PUNCH_AUTH_TIMEOUT_MS'),
    controlTimeoutMs: parseMillis(env, 'HOLE_PUNCH_CONTROL_TIMEOUT_MS'),
    bindOutbound: env.HOLE_PUNCH_BIND_OUTBOUND === undefined ? undefined : env.HOLE_PUNCH_BIND_OUTBOUND !== 'false'
  };
}
