import { readFileSync } from 'node:fs';

import type { Configuration } from '../interfaces';
import { ConfigurationError } from '../errors';
import { FailureThresholdHealthObserver } from '../health';
import { UpstreamTarget } from '../UpstreamTarget';
import { MAX_TIMEOUT } from '../utils';

export type Environment = Record<string, string | undefined>;

export interface EnvironmentConfiguration {
  configuration: Configuration;
  logLevel: string;
}

const DEFAULT_UPSTREAM_SERVERS = 'http://localhost:8080';

/**
 * Parse integer variable
 * @param env
 * @param name
 * @param defaultValue
 * @param min
 */
const getInteger = (env: Environment, name: string, defaultValue: number, min: number, max = Number.MAX_SAFE_INTEGER): number => {
  const raw = env[name]?.trim();
  if (!raw) {
    return defaultValue;
  }

  if (!/^\d+$/.test(raw)) {
    throw new ConfigurationError(`Invalid ${name} "${raw}", expected integer`);
  }

  const value = Number(raw);
  if (value < min || value > max) {
    throw new ConfigurationError(`Invalid ${name} "${raw}", expected value between ${min} and ${max}`);
  }

  return value;
}

const getBoolean = (env: Environment, name: string, defaultValue: boolean): boolean => {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) {
    return defaultValue;
  }

  if (raw === 'true' || raw === '1') {
    return true;
  }

  if (raw === 'false' || raw === '0') {
    return false;
  }

  throw new ConfigurationError(`Invalid ${name} "${raw}", expected true or false`);
}

const readPem = (name: string, path: string): string => {
  try {
    return readFileSync(path, 'utf-8');
  } catch (e) {
    throw new ConfigurationError(`Unable to read ${name} "${path}": ${e instanceof Error ? e.message : String(e)}`);
  }
}

/**
 * Build proxy configuration from environment variables
 * @param env
 * @throws ConfigurationError
 */
export const loadConfigurationFromEnv = (env: Environment = process.env): EnvironmentConfiguration => {
  const upstream = (env.UPSTREAM_SERVERS ?? DEFAULT_UPSTREAM_SERVERS)
    .split(',')
    .map(s => s.trim());

  if (upstream.length === 1 && !upstream[0]) {
    throw new ConfigurationError('UPSTREAM_SERVERS is empty');
  }

  // fail fast with the offending entry
  upstream.forEach(address => UpstreamTarget.parse(address));

  const certPath = env.SSL_CERT_PATH?.trim();
  const keyPath = env.SSL_KEY_PATH?.trim();
  if (!!certPath !== !!keyPath) {
    throw new ConfigurationError('Both SSL_CERT_PATH and SSL_KEY_PATH are required to enable TLS');
  }

  const configuration: Configuration = {
    hostname: env.LISTEN_HOST?.trim() || '0.0.0.0',
    port: getInteger(env, 'LISTEN_PORT', certPath ? 443 : 80, 0, 65535),
    upstream,
    connectTimeout: getInteger(env, 'CONNECT_TIMEOUT_MS', 5 * 1000, 1, MAX_TIMEOUT),
    upstreamTimeout: getInteger(env, 'UPSTREAM_TIMEOUT_MS', 60 * 1000, 1, MAX_TIMEOUT),
    clientTimeout: getInteger(env, 'CLIENT_TIMEOUT_MS', 60 * 1000, 1, MAX_TIMEOUT),
    retryOnTimeout: getBoolean(env, 'RETRY_ON_TIMEOUT', false),
  };

  if (env.MAX_ATTEMPTS?.trim()) {
    configuration.maxAttempts = getInteger(env, 'MAX_ATTEMPTS', upstream.length, 1);
  }

  const failureThreshold = getInteger(env, 'HEALTH_FAILURE_THRESHOLD', 0, 0);
  if (failureThreshold > 0) {
    configuration.healthObserver = new FailureThresholdHealthObserver({
      failureThreshold,
      cooldown: getInteger(env, 'HEALTH_COOLDOWN_MS', 30 * 1000, 0, MAX_TIMEOUT),
    });
  }

  if (certPath && keyPath) {
    configuration.secure = {
      cert: readPem('SSL_CERT_PATH', certPath),
      key: readPem('SSL_KEY_PATH', keyPath),
    };
  }

  return {
    configuration,
    logLevel: env.LOG_LEVEL?.trim() || 'info',
  };
}
