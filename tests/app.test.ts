import { describe, it, expect, afterEach, vi } from 'vitest';
import { ethers } from 'ethers';
import { rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { InMemoryRpcProvider } from './helpers/InMemoryRpcProvider';
import { DESTINATION_BRIDGE_ABI, SOURCE_BRIDGE_ABI } from '../src/abi';
import { createConnectionFactory, createInvokerFactory, createSeenKeyStore } from '../src/app';
import { SimulatedInvoker, WalletInvoker } from '../src/chain/invokers';
import { ConfigError } from '../src/errors';
import { JsonlSeenKeyStore } from '../src/store/JsonlSeenKeyStore';
import { InMemorySeenKeyStore } from '../src/store/SeenKeyStore';
import { DESTINATION_ADDRESS, SOURCE_ADDRESS, testConfig } from './helpers/fakes';

const PLACEHOLDER_KEY = '0x' + '01'.repeat(32);

describe('createInvokerFactory', () => {
  it('simulates submissions by default', () => {
    const factory = createInvokerFactory(testConfig());

    expect(factory(new InMemoryRpcProvider(), 'DestinationChain')).toBeInstanceOf(SimulatedInvoker);
  });

  it('signs with the private key in wallet mode', () => {
    const config = testConfig();
    const factory = createInvokerFactory({ ...config, submission: { ...config.submission, mode: 'wallet' } }, PLACEHOLDER_KEY);

    expect(factory(new InMemoryRpcProvider(), 'DestinationChain')).toBeInstanceOf(WalletInvoker);
  });

  it('refuses wallet mode without a key', () => {
    const config = testConfig();

    expect(() => createInvokerFactory({ ...config, submission: { ...config.submission, mode: 'wallet' } })).toThrow(
      ConfigError
    );
  });
});

describe('createConnectionFactory', () => {
  it('builds the configured invoker for destination handles only', async () => {
    const provider = new InMemoryRpcProvider();
    const invokerFactory = vi.fn(
      (_provider: ethers.providers.JsonRpcProvider, chainName: string) => new SimulatedInvoker(chainName, 0)
    );
    const factory = createConnectionFactory(invokerFactory, () => provider);

    const source = factory({ name: 'SourceChain', rpcUrl: 'http://source.test' }, 'source');
    const destination = factory({ name: 'DestinationChain', rpcUrl: 'http://destination.test' }, 'destination');
    await source.connect();
    await destination.connect();
    source.getContractHandle(SOURCE_ADDRESS, SOURCE_BRIDGE_ABI);
    destination.getContractHandle(DESTINATION_ADDRESS, DESTINATION_BRIDGE_ABI);

    expect(invokerFactory).toHaveBeenCalledTimes(1);
    expect(invokerFactory).toHaveBeenCalledWith(provider, 'DestinationChain');
  });
});

describe('createSeenKeyStore', () => {
  const dir = join(tmpdir(), `relayer-app-test-${process.pid}`);

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('keeps keys in memory without a path', () => {
    expect(createSeenKeyStore(testConfig())).toBeInstanceOf(InMemorySeenKeyStore);
  });

  it('persists keys when a path is configured', () => {
    const store = createSeenKeyStore(testConfig({ seenKeysPath: join(dir, 'seen.jsonl') }));

    expect(store).toBeInstanceOf(JsonlSeenKeyStore);
  });
});
