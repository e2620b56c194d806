import { ethers } from 'ethers';
import {
  classifyError,
  describeError,
  errorCode,
  isAlreadyBroadcastError,
  isRetryableSubmissionError
} from '../errors';
import { ReceiptRef, Result, SubmissionError } from '../types';
import { logger } from '../utils/logger';
import { RetryPolicy, withRetry } from '../utils/retry';
import { sleep } from '../utils/sleep';

/**
 * Performs a state-changing contract call. Implementations report every
 * failure through the result and never throw.
 */
export interface TransactionInvoker {
  invoke(
    contract: ethers.Contract,
    functionName: string,
    args: readonly unknown[]
  ): Promise<Result<ReceiptRef, SubmissionError>>;
}

function encodeCall(
  contract: ethers.Contract,
  functionName: string,
  args: readonly unknown[]
): Result<string, SubmissionError> {
  try {
    return { ok: true, value: contract.interface.encodeFunctionData(functionName, args) };
  } catch (error) {
    return {
      ok: false,
      error: { kind: 'rejected', message: `Cannot encode ${functionName}: ${describeError(error)}` }
    };
  }
}

/**
 * Logs the call it would make, waits as long as a confirmation might take
 * and reports success. Nothing is signed or broadcast.
 */
export class SimulatedInvoker implements TransactionInvoker {
  constructor(
    private chainName: string,
    private latencyMs: number
  ) {}

  public async invoke(
    contract: ethers.Contract,
    functionName: string,
    args: readonly unknown[]
  ): Promise<Result<ReceiptRef, SubmissionError>> {
    const encoded = encodeCall(contract, functionName, args);
    if (!encoded.ok) {
      return encoded;
    }

    logger.info('Simulated transaction submission', {
      chain: this.chainName,
      contract: contract.address,
      functionName,
      args: args.map(arg => String(arg))
    });

    await sleep(this.latencyMs);

    return {
      ok: true,
      value: {
        transactionHash: ethers.utils.keccak256(encoded.value),
        simulated: true
      }
    };
  }
}

export interface WalletInvokerOptions {
  /** Blocks to wait for after inclusion */
  confirmations: number;
  /** Fixed gas limit; estimated by the node when absent */
  gasLimit?: number;
  /** Longest single wait for a receipt; 0 waits indefinitely */
  receiptTimeoutMs: number;
  retry: RetryPolicy;
}

/**
 * Signs with a local key, broadcasts and waits for the receipt.
 *
 * A call is signed once. Transient broadcast failures resend those same
 * bytes, and a failed wait keeps waiting on the same hash, so retries never
 * produce a second transaction. A transaction that may have reached the node
 * but was never seen mined is reported as `unconfirmed`.
 */
export class WalletInvoker implements TransactionInvoker {
  private wallet: ethers.Wallet;

  constructor(
    private chainName: string,
    privateKey: string,
    private provider: ethers.providers.Provider,
    private options: WalletInvokerOptions
  ) {
    this.wallet = new ethers.Wallet(privateKey, provider);
  }

  public async invoke(
    contract: ethers.Contract,
    functionName: string,
    args: readonly unknown[]
  ): Promise<Result<ReceiptRef, SubmissionError>> {
    const encoded = encodeCall(contract, functionName, args);
    if (!encoded.ok) {
      return encoded;
    }
    const label = `${functionName} on ${this.chainName}`;

    let signed: string;
    try {
      signed = await withRetry(
        async () =>
          this.wallet.signTransaction(
            await this.wallet.populateTransaction({
              to: contract.address,
              data: encoded.value,
              gasLimit: this.options.gasLimit
            })
          ),
        this.options.retry,
        isRetryableSubmissionError,
        `Signing ${label}`
      );
    } catch (error) {
      return { ok: false, error: toSubmissionError(error) };
    }
    const transactionHash = ethers.utils.keccak256(signed);

    try {
      await withRetry(
        attempt => this.broadcast(signed, attempt),
        this.options.retry,
        isRetryableSubmissionError,
        `Broadcast of ${label}`
      );
    } catch (error) {
      return { ok: false, error: broadcastFailure(error, transactionHash) };
    }
    logger.info(`${functionName} transaction sent: ${transactionHash}`, { chain: this.chainName });

    let receipt: ethers.providers.TransactionReceipt;
    try {
      receipt = await withRetry(
        () =>
          this.provider.waitForTransaction(transactionHash, this.options.confirmations, this.options.receiptTimeoutMs),
        this.options.retry,
        error => classifyError(error) === 'connectivity',
        `Receipt of ${label}`
      );
    } catch (error) {
      return {
        ok: false,
        error: {
          kind: 'unconfirmed',
          message: `No receipt for ${transactionHash}: ${describeError(error)}`,
          transactionHash
        }
      };
    }

    if (receipt.status !== 1) {
      return {
        ok: false,
        error: { kind: 'reverted', message: `Transaction ${receipt.transactionHash} reverted`, transactionHash }
      };
    }

    logger.info(
      `${functionName} confirmed: block=${receipt.blockNumber}, hash=${receipt.transactionHash}`,
      { chain: this.chainName }
    );

    return {
      ok: true,
      value: {
        transactionHash: receipt.transactionHash,
        blockNumber: receipt.blockNumber,
        simulated: false
      }
    };
  }

  private async broadcast(signed: string, attempt: number): Promise<void> {
    try {
      await this.provider.sendTransaction(signed);
    } catch (error) {
      // An earlier attempt got through
      if (attempt > 0 && isAlreadyBroadcastError(error)) {
        return;
      }
      throw error;
    }
  }
}

function broadcastFailure(error: unknown, transactionHash: string): SubmissionError {
  // A send that died in transit may still have reached the node
  if (classifyError(error) === 'connectivity') {
    return {
      kind: 'unconfirmed',
      message: `Broadcast of ${transactionHash} not acknowledged: ${describeError(error)}`,
      transactionHash
    };
  }
  return { ...toSubmissionError(error), transactionHash };
}

export function toSubmissionError(error: unknown): SubmissionError {
  const message = describeError(error);

  if (errorCode(error) === 'CALL_EXCEPTION') {
    return { kind: 'reverted', message };
  }
  if (classifyError(error) === 'connectivity') {
    return { kind: 'unreachable', message };
  }
  return { kind: 'rejected', message };
}
