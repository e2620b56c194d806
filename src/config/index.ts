// src/config/index.ts

import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { ConfigError, describeError } from '../errors';
import { logger } from '../utils/logger';
import { ChainConfig, EnvVars, RelayerConfig, SubmissionConfig, SubmissionMode } from './types';

/**
 * Values used when neither the config file nor the environment sets them
 */
export const DEFAULTS = {
  sourceName: 'SourceChain',
  destinationName: 'DestinationChain',
  startBlockLag: 10,
  pollingIntervalMs: 15_000,
  idleDelayMs: 10_000,
  rpcFailureBackoffMs: 30_000,
  errorBackoffMs: 60_000,
  redeliveryAttempts: 0,
  submission: {
    mode: 'simulated',
    simulatedLatencyMs: 2_000,
    confirmations: 1,
    receiptTimeoutMs: 120_000,
    maxRetries: 3,
    retryBaseDelayMs: 1_000,
    retryMaxDelayMs: 30_000
  }
} as const;

/**
 * Config as it may appear in the YAML file: every field optional
 */
export interface PartialRelayerConfig {
  source?: Partial<ChainConfig>;
  destination?: Partial<ChainConfig>;
  startBlock?: unknown;
  startBlockLag?: unknown;
  pollingIntervalMs?: unknown;
  idleDelayMs?: unknown;
  rpcFailureBackoffMs?: unknown;
  errorBackoffMs?: unknown;
  redeliveryAttempts?: unknown;
  seenKeysPath?: unknown;
  submission?: Partial<Record<keyof SubmissionConfig, unknown>>;
}

/**
 * Pick the relayer's variables out of an environment
 */
export function getEnvVars(env: NodeJS.ProcessEnv = process.env): EnvVars {
  return {
    SOURCE_CHAIN_RPC_URL: env.SOURCE_CHAIN_RPC_URL,
    DESTINATION_CHAIN_RPC_URL: env.DESTINATION_CHAIN_RPC_URL,
    SOURCE_CONTRACT_ADDRESS: env.SOURCE_CONTRACT_ADDRESS,
    DESTINATION_CONTRACT_ADDRESS: env.DESTINATION_CONTRACT_ADDRESS,
    START_BLOCK: env.START_BLOCK,
    POLLING_INTERVAL_MS: env.POLLING_INTERVAL_MS,
    SUBMISSION_MODE: env.SUBMISSION_MODE,
    PRIVATE_KEY: env.PRIVATE_KEY,
    SEEN_KEYS_PATH: env.SEEN_KEYS_PATH,
    REDELIVERY_ATTEMPTS: env.REDELIVERY_ATTEMPTS,
    CONFIG_PATH: env.CONFIG_PATH,
    LOG_LEVEL: env.LOG_LEVEL,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load configuration from YAML file
 */
export function loadConfigFromFile(filePath: string): PartialRelayerConfig {
  let parsed: unknown;
  try {
    parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Failed to load config file: ${describeError(error)}`);
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain a mapping`);
  }

  const section = (value: unknown): Record<string, unknown> | undefined => (isRecord(value) ? value : undefined);
  const text = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined);
  const chain = (value: unknown): Partial<ChainConfig> | undefined => {
    const raw = section(value);
    return raw && { name: text(raw.name), rpcUrl: text(raw.rpcUrl), contractAddress: text(raw.contractAddress) };
  };

  return {
    source: chain(parsed.source),
    destination: chain(parsed.destination),
    startBlock: parsed.startBlock,
    startBlockLag: parsed.startBlockLag,
    pollingIntervalMs: parsed.pollingIntervalMs,
    idleDelayMs: parsed.idleDelayMs,
    rpcFailureBackoffMs: parsed.rpcFailureBackoffMs,
    errorBackoffMs: parsed.errorBackoffMs,
    redeliveryAttempts: parsed.redeliveryAttempts,
    seenKeysPath: parsed.seenKeysPath,
    submission: section(parsed.submission),
  };
}

function nonNegativeInteger(name: string, value: unknown, fallback: number): number;
function nonNegativeInteger(name: string, value: unknown, fallback?: number): number | undefined;
function nonNegativeInteger(name: string, value: unknown, fallback?: number): number | undefined {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }
  const parsed = typeof value === 'string' && /^\d+$/.test(value.trim()) ? Number(value.trim()) : value;
  if (typeof parsed !== 'number' || !Number.isSafeInteger(parsed) || parsed < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got ${String(value)}`);
  }
  return parsed;
}

function requiredString(name: string, value: string | undefined): string {
  if (value === undefined || value.trim() === '') {
    throw new ConfigError(`Missing configuration for '${name}'`);
  }
  return value.trim();
}

function rpcUrl(name: string, value: string | undefined): string {
  const url = requiredString(name, value);
  let protocol: string;
  try {
    protocol = new URL(url).protocol;
  } catch {
    throw new ConfigError(`${name} is not a valid URL: ${url}`);
  }
  if (protocol !== 'http:' && protocol !== 'https:') {
    throw new ConfigError(`${name} must be an http(s) URL: ${url}`);
  }
  return url;
}

function submissionMode(value: unknown): SubmissionMode {
  if (value === 'simulated' || value === 'wallet') {
    return value;
  }
  throw new ConfigError(`Unknown submission mode: ${String(value)}`);
}

function optionalString(name: string, value: unknown): string | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ConfigError(`${name} must be a string`);
  }
  return value;
}

/**
 * Merge defaults, file config and environment (highest precedence) into a
 * complete configuration. Throws ConfigError on anything missing or invalid.
 */
export function buildConfig(env: EnvVars, file: PartialRelayerConfig = {}): RelayerConfig {
  const submission: Partial<Record<keyof SubmissionConfig, unknown>> = file.submission ?? {};

  const mode = submissionMode(env.SUBMISSION_MODE ?? submission.mode ?? DEFAULTS.submission.mode);
  if (mode === 'wallet' && !env.PRIVATE_KEY) {
    throw new ConfigError('PRIVATE_KEY environment variable is required in wallet submission mode');
  }

  const seenKeysPath = optionalString('seenKeysPath', env.SEEN_KEYS_PATH ?? file.seenKeysPath);

  return {
    source: {
      name: file.source?.name ?? DEFAULTS.sourceName,
      rpcUrl: rpcUrl('SOURCE_CHAIN_RPC_URL', env.SOURCE_CHAIN_RPC_URL ?? file.source?.rpcUrl),
      contractAddress: requiredString('SOURCE_CONTRACT_ADDRESS', env.SOURCE_CONTRACT_ADDRESS ?? file.source?.contractAddress),
    },
    destination: {
      name: file.destination?.name ?? DEFAULTS.destinationName,
      rpcUrl: rpcUrl('DESTINATION_CHAIN_RPC_URL', env.DESTINATION_CHAIN_RPC_URL ?? file.destination?.rpcUrl),
      contractAddress: requiredString(
        'DESTINATION_CONTRACT_ADDRESS',
        env.DESTINATION_CONTRACT_ADDRESS ?? file.destination?.contractAddress
      ),
    },
    startBlock: nonNegativeInteger('startBlock', env.START_BLOCK ?? file.startBlock),
    startBlockLag: nonNegativeInteger('startBlockLag', file.startBlockLag, DEFAULTS.startBlockLag),
    pollingIntervalMs: nonNegativeInteger(
      'pollingIntervalMs',
      env.POLLING_INTERVAL_MS ?? file.pollingIntervalMs,
      DEFAULTS.pollingIntervalMs
    ),
    idleDelayMs: nonNegativeInteger('idleDelayMs', file.idleDelayMs, DEFAULTS.idleDelayMs),
    rpcFailureBackoffMs: nonNegativeInteger('rpcFailureBackoffMs', file.rpcFailureBackoffMs, DEFAULTS.rpcFailureBackoffMs),
    errorBackoffMs: nonNegativeInteger('errorBackoffMs', file.errorBackoffMs, DEFAULTS.errorBackoffMs),
    redeliveryAttempts: nonNegativeInteger(
      'redeliveryAttempts',
      env.REDELIVERY_ATTEMPTS ?? file.redeliveryAttempts,
      DEFAULTS.redeliveryAttempts
    ),
    seenKeysPath,
    submission: {
      mode,
      simulatedLatencyMs: nonNegativeInteger(
        'submission.simulatedLatencyMs',
        submission.simulatedLatencyMs,
        DEFAULTS.submission.simulatedLatencyMs
      ),
      confirmations: nonNegativeInteger('submission.confirmations', submission.confirmations, DEFAULTS.submission.confirmations),
      receiptTimeoutMs: nonNegativeInteger(
        'submission.receiptTimeoutMs',
        submission.receiptTimeoutMs,
        DEFAULTS.submission.receiptTimeoutMs
      ),
      gasLimit: nonNegativeInteger('submission.gasLimit', submission.gasLimit),
      maxRetries: nonNegativeInteger('submission.maxRetries', submission.maxRetries, DEFAULTS.submission.maxRetries),
      retryBaseDelayMs: nonNegativeInteger(
        'submission.retryBaseDelayMs',
        submission.retryBaseDelayMs,
        DEFAULTS.submission.retryBaseDelayMs
      ),
      retryMaxDelayMs: nonNegativeInteger(
        'submission.retryMaxDelayMs',
        submission.retryMaxDelayMs,
        DEFAULTS.submission.retryMaxDelayMs
      ),
    },
  };
}

/**
 * Load relayer configuration from CONFIG_PATH (or ./config.yaml when present)
 * and the environment
 */
export function getConfig(env: EnvVars = getEnvVars()): RelayerConfig {
  let fileConfig: PartialRelayerConfig = {};

  if (env.CONFIG_PATH) {
    if (!fs.existsSync(env.CONFIG_PATH)) {
      throw new ConfigError(`Config file not found at ${env.CONFIG_PATH}`);
    }
    logger.info(`Loading configuration from specified path: ${env.CONFIG_PATH}`);
    fileConfig = loadConfigFromFile(env.CONFIG_PATH);
  } else {
    const defaultPath = path.join(process.cwd(), 'config.yaml');
    if (fs.existsSync(defaultPath)) {
      logger.info(`Loading configuration from default path: ${defaultPath}`);
      fileConfig = loadConfigFromFile(defaultPath);
    }
  }

  return buildConfig(env, fileConfig);
}

// Export types
export * from './types';
