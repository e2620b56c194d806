import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DEFAULTS, buildConfig, getConfig, getEnvVars, loadConfigFromFile } from '../src/config';
import { EnvVars } from '../src/config/types';
import { ConfigError } from '../src/errors';
import { DESTINATION_ADDRESS, SOURCE_ADDRESS } from './helpers/fakes';

const baseEnv: EnvVars = {
  SOURCE_CHAIN_RPC_URL: 'http://localhost:8545',
  DESTINATION_CHAIN_RPC_URL: 'https://destination.example',
  SOURCE_CONTRACT_ADDRESS: SOURCE_ADDRESS,
  DESTINATION_CONTRACT_ADDRESS: DESTINATION_ADDRESS
};

let testDir: string;

beforeEach(() => {
  testDir = join(tmpdir(), `relayer-config-test-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`);
  mkdirSync(testDir, { recursive: true });
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

function writeYaml(contents: string): string {
  const filePath = join(testDir, 'config.yaml');
  writeFileSync(filePath, contents);
  return filePath;
}

describe('getEnvVars', () => {
  it('picks the relayer variables out of the environment', () => {
    const env = getEnvVars({ SOURCE_CHAIN_RPC_URL: 'http://a', START_BLOCK: '12', UNRELATED: 'x' });

    expect(env.SOURCE_CHAIN_RPC_URL).toBe('http://a');
    expect(env.START_BLOCK).toBe('12');
    expect(env).not.toHaveProperty('UNRELATED');
  });
});

describe('buildConfig', () => {
  it('fills in defaults', () => {
    const config = buildConfig(baseEnv);

    expect(config).toEqual({
      source: { name: 'SourceChain', rpcUrl: 'http://localhost:8545', contractAddress: SOURCE_ADDRESS },
      destination: { name: 'DestinationChain', rpcUrl: 'https://destination.example', contractAddress: DESTINATION_ADDRESS },
      startBlock: undefined,
      startBlockLag: 10,
      pollingIntervalMs: 15_000,
      idleDelayMs: 10_000,
      rpcFailureBackoffMs: 30_000,
      errorBackoffMs: 60_000,
      redeliveryAttempts: 0,
      seenKeysPath: undefined,
      submission: {
        mode: 'simulated',
        simulatedLatencyMs: 2_000,
        confirmations: 1,
        receiptTimeoutMs: 120_000,
        gasLimit: undefined,
        maxRetries: 3,
        retryBaseDelayMs: 1_000,
        retryMaxDelayMs: 30_000
      }
    });
    expect(config.pollingIntervalMs).toBe(DEFAULTS.pollingIntervalMs);
  });

  it('parses numeric environment overrides', () => {
    const config = buildConfig({ ...baseEnv, START_BLOCK: '1200', POLLING_INTERVAL_MS: '500', REDELIVERY_ATTEMPTS: '2' });

    expect(config.startBlock).toBe(1200);
    expect(config.pollingIntervalMs).toBe(500);
    expect(config.redeliveryAttempts).toBe(2);
  });

  it.each(['SOURCE_CHAIN_RPC_URL', 'DESTINATION_CHAIN_RPC_URL', 'SOURCE_CONTRACT_ADDRESS', 'DESTINATION_CONTRACT_ADDRESS'] as const)(
    'requires %s',
    name => {
      const env: EnvVars = { ...baseEnv };
      delete env[name];

      expect(() => buildConfig(env)).toThrow(`Missing configuration for '${name}'`);
    }
  );

  it('rejects invalid values', () => {
    expect(() => buildConfig({ ...baseEnv, START_BLOCK: '-1' })).toThrow(ConfigError);
    expect(() => buildConfig({ ...baseEnv, POLLING_INTERVAL_MS: 'soon' })).toThrow(ConfigError);
    expect(() => buildConfig({ ...baseEnv, SOURCE_CHAIN_RPC_URL: 'ws://localhost:8546' })).toThrow(
      'SOURCE_CHAIN_RPC_URL must be an http(s) URL: ws://localhost:8546'
    );
    expect(() => buildConfig({ ...baseEnv, SUBMISSION_MODE: 'carrier-pigeon' })).toThrow(
      'Unknown submission mode: carrier-pigeon'
    );
  });

  it('requires a private key in wallet mode', () => {
    expect(() => buildConfig({ ...baseEnv, SUBMISSION_MODE: 'wallet' })).toThrow(ConfigError);
    expect(buildConfig({ ...baseEnv, SUBMISSION_MODE: 'wallet', PRIVATE_KEY: 'test-secret' }).submission.mode).toBe(
      'wallet'
    );
  });

  it('lets the environment override the file', () => {
    const config = buildConfig(
      { ...baseEnv, POLLING_INTERVAL_MS: '1000' },
      { pollingIntervalMs: 5_000, idleDelayMs: 2_000, source: { name: 'Sepolia' } }
    );

    expect(config.pollingIntervalMs).toBe(1_000);
    expect(config.idleDelayMs).toBe(2_000);
    expect(config.source.name).toBe('Sepolia');
  });
});

describe('loadConfigFromFile', () => {
  it('reads chains, timings and submission settings', () => {
    const filePath = writeYaml(
      [
        'source:',
        '  name: Holesky',
        '  rpcUrl: http://holesky.test',
        `  contractAddress: "${SOURCE_ADDRESS}"`,
        'startBlockLag: 25',
        'seenKeysPath: data/seen.jsonl',
        'submission:',
        '  mode: wallet',
        '  gasLimit: 500000'
      ].join('\n')
    );

    const file = loadConfigFromFile(filePath);

    expect(file.source).toEqual({ name: 'Holesky', rpcUrl: 'http://holesky.test', contractAddress: SOURCE_ADDRESS });
    expect(file.startBlockLag).toBe(25);
    expect(file.seenKeysPath).toBe('data/seen.jsonl');
    expect(file.submission).toEqual({ mode: 'wallet', gasLimit: 500000 });
  });

  it('treats an empty file as no configuration', () => {
    expect(loadConfigFromFile(writeYaml(''))).toEqual({});
  });

  it('rejects a file that is not a mapping', () => {
    expect(() => loadConfigFromFile(writeYaml('- a\n- b\n'))).toThrow(ConfigError);
  });
});

describe('getConfig', () => {
  it('loads the file named by CONFIG_PATH', () => {
    const filePath = writeYaml(['destination:', '  name: Amoy', 'errorBackoffMs: 120000'].join('\n'));

    const config = getConfig({ ...baseEnv, CONFIG_PATH: filePath });

    expect(config.destination.name).toBe('Amoy');
    expect(config.errorBackoffMs).toBe(120_000);
  });

  it('fails when CONFIG_PATH does not exist', () => {
    expect(() => getConfig({ ...baseEnv, CONFIG_PATH: join(testDir, 'missing.yaml') })).toThrow(ConfigError);
  });
});
