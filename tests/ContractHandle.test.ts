import { describe, it, expect, beforeEach } from 'vitest';
import { ethers } from 'ethers';
import { DESTINATION_BRIDGE_ABI, SOURCE_BRIDGE_ABI } from '../src/abi';
import { EthersContractHandle } from '../src/chain/ContractHandle';
import { SimulatedInvoker } from '../src/chain/invokers';
import { RelayError } from '../src/errors';
import { DESTINATION_ADDRESS, RECIPIENT, SOURCE_ADDRESS } from './helpers/fakes';
import { InMemoryRpcProvider, StoredLog, networkError } from './helpers/InMemoryRpcProvider';

const SENDER = '0x4444444444444444444444444444444444444444';
const sourceInterface = new ethers.utils.Interface(SOURCE_BRIDGE_ABI);

function lockedLog(blockNumber: number, logIndex: number, amount: number, nonce: number): StoredLog {
  const { data, topics } = sourceInterface.encodeEventLog(sourceInterface.getEvent('TokensLocked'), [
    SENDER,
    RECIPIENT,
    amount,
    nonce
  ]);
  return {
    address: SOURCE_ADDRESS,
    blockNumber,
    logIndex,
    transactionHash: ethers.utils.hexZeroPad(ethers.utils.hexValue(blockNumber * 100 + logIndex), 32),
    data,
    topics
  };
}

describe('EthersContractHandle', () => {
  let provider: InMemoryRpcProvider;
  let handle: EthersContractHandle;

  beforeEach(() => {
    provider = new InMemoryRpcProvider();
    provider.headBlock = 100;
    handle = new EthersContractHandle(
      'SourceChain',
      new ethers.Contract(SOURCE_ADDRESS, SOURCE_BRIDGE_ABI, provider),
      new SimulatedInvoker('SourceChain', 0)
    );
  });

  it('decodes lock events in block and log order', async () => {
    provider.logs = [lockedLog(97, 3, 20, 2), lockedLog(95, 1, 10, 1), lockedLog(97, 0, 30, 3)];

    const events = await handle.readEvents('TokensLocked', 91, 100);

    expect(events.map(event => [event.blockNumber, event.logIndex])).toEqual([
      [95, 1],
      [97, 0],
      [97, 3]
    ]);
    expect(events[0]).toEqual({
      transactionHash: ethers.utils.hexZeroPad(ethers.utils.hexValue(9501), 32),
      blockNumber: 95,
      logIndex: 1,
      args: { sender: SENDER, recipient: RECIPIENT, amount: 10n, nonce: 1n }
    });
  });

  it('queries the inclusive range', async () => {
    provider.logs = [lockedLog(90, 0, 1, 1), lockedLog(91, 0, 1, 2), lockedLog(100, 0, 1, 3), lockedLog(101, 0, 1, 4)];

    const events = await handle.readEvents('TokensLocked', 91, 100);

    expect(events.map(event => event.args.nonce)).toEqual([2n, 3n]);
  });

  it('returns an empty list when nothing matched', async () => {
    await expect(handle.readEvents('TokensLocked', 91, 100)).resolves.toEqual([]);
  });

  it('surfaces a failed query instead of an empty list', async () => {
    provider.failures.set('eth_getLogs', networkError('getLogs failed'));

    const result = handle.readEvents('TokensLocked', 91, 100);

    await expect(result).rejects.toBeInstanceOf(RelayError);
    await expect(result).rejects.toMatchObject({ kind: 'connectivity' });
  });

  it('rejects an inverted range without querying', async () => {
    await expect(handle.readEvents('TokensLocked', 10, 9)).rejects.toMatchObject({ kind: 'malformed-data' });
    expect(provider.calls.filter(call => call.method === 'eth_getLogs')).toHaveLength(0);
  });

  it('rejects an event missing from the interface', async () => {
    await expect(handle.readEvents('TokensBurned', 1, 2)).rejects.toMatchObject({ kind: 'malformed-data' });
  });

  it('invokes through its transaction invoker', async () => {
    const destinationInterface = new ethers.utils.Interface(DESTINATION_BRIDGE_ABI);
    const destination = new EthersContractHandle(
      'DestinationChain',
      new ethers.Contract(DESTINATION_ADDRESS, DESTINATION_BRIDGE_ABI, provider),
      new SimulatedInvoker('DestinationChain', 0)
    );

    const result = await destination.invoke('unlockTokens', [RECIPIENT, 1000n, 5n]);

    expect(result).toEqual({
      ok: true,
      value: {
        transactionHash: ethers.utils.keccak256(
          destinationInterface.encodeFunctionData('unlockTokens', [RECIPIENT, 1000n, 5n])
        ),
        simulated: true
      }
    });
  });

  it('reports arguments the function cannot take as a rejected submission', async () => {
    const destination = new EthersContractHandle(
      'DestinationChain',
      new ethers.Contract(DESTINATION_ADDRESS, DESTINATION_BRIDGE_ABI, provider),
      new SimulatedInvoker('DestinationChain', 0)
    );

    const result = await destination.invoke('unlockTokens', ['not-an-address', 1n, 1n]);

    expect(result.ok).toBe(false);
    expect(result.ok ? undefined : result.error.kind).toBe('rejected');
  });
});
