import { ethers } from 'ethers';
import { RelayError, describeError } from '../errors';
import { RawEvent, ReceiptRef, Result, SubmissionError } from '../types';
import { TransactionInvoker, toSubmissionError } from './invokers';

/**
 * A deployed contract bound to one ledger connection
 */
export interface ContractHandle {
  readonly address: string;
  readonly chainName: string;

  /**
   * All occurrences of `eventName` in the inclusive range, ordered by block
   * and then log index. Throws a RelayError when the range is inverted or
   * the query fails; an empty array always means "no events".
   */
  readEvents(eventName: string, fromBlock: number, toBlock: number): Promise<RawEvent[]>;

  invoke(functionName: string, args: readonly unknown[]): Promise<Result<ReceiptRef, SubmissionError>>;
}

function toPlainValue(value: unknown): unknown {
  return ethers.BigNumber.isBigNumber(value) ? value.toBigInt() : value;
}

export class EthersContractHandle implements ContractHandle {
  constructor(
    public readonly chainName: string,
    private contract: ethers.Contract,
    private invoker: TransactionInvoker
  ) {}

  public get address(): string {
    return this.contract.address;
  }

  public async readEvents(eventName: string, fromBlock: number, toBlock: number): Promise<RawEvent[]> {
    if (fromBlock > toBlock) {
      throw new RelayError('malformed-data', `Invalid block range [${fromBlock}, ${toBlock}]`);
    }

    let fragment: ethers.utils.EventFragment;
    try {
      fragment = this.contract.interface.getEvent(eventName);
    } catch (error) {
      throw new RelayError('malformed-data', `Event ${eventName} is not part of the contract interface`, error);
    }

    let events: ethers.Event[];
    try {
      events = await this.contract.queryFilter(eventName, fromBlock, toBlock);
    } catch (error) {
      throw new RelayError(
        'connectivity',
        `Failed to read ${eventName} events from ${this.chainName} in [${fromBlock}, ${toBlock}]: ${describeError(error)}`,
        error
      );
    }

    return events
      .map(event => {
        const args: Record<string, unknown> = {};
        // Logs that fail to decode carry no args and are rejected downstream
        if (event.args) {
          for (const input of fragment.inputs) {
            const value: unknown = event.args[input.name];
            if (value !== undefined) {
              args[input.name] = toPlainValue(value);
            }
          }
        }

        return {
          transactionHash: event.transactionHash,
          blockNumber: event.blockNumber,
          logIndex: event.logIndex,
          args
        };
      })
      .sort((a, b) => a.blockNumber - b.blockNumber || a.logIndex - b.logIndex);
  }

  public async invoke(
    functionName: string,
    args: readonly unknown[]
  ): Promise<Result<ReceiptRef, SubmissionError>> {
    try {
      return await this.invoker.invoke(this.contract, functionName, args);
    } catch (error) {
      return { ok: false, error: toSubmissionError(error) };
    }
  }
}
