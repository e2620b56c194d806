import { UNLOCK_FUNCTION_NAME } from '../abi';
import { ContractHandle } from '../chain/ContractHandle';
import { LedgerConnection } from '../chain/LedgerConnection';
import { describeError } from '../errors';
import { NormalizedEvent } from '../types';
import { logger } from '../utils/logger';

export type SubmitAttempt = { delivered: true } | { delivered: false; resubmittable: boolean };

/**
 * Sends the destination-chain unlock for a validated lock event
 */
export class ActionSubmitter {
  constructor(
    private connection: LedgerConnection,
    private contract: ContractHandle,
    private functionName: string = UNLOCK_FUNCTION_NAME
  ) {
    logger.info(`ActionSubmitter initialized for contract ${contract.address} on ${connection.name}`);
  }

  /**
   * Resolves true only when the destination reports success. A dead
   * destination fails at once; retrying is the caller's decision.
   */
  public async submit(event: NormalizedEvent): Promise<boolean> {
    return (await this.attempt(event)).delivered;
  }

  /**
   * Like `submit`, and tells the caller whether a failed unlock may be sent
   * again without risking a second execution.
   */
  public async attempt(event: NormalizedEvent): Promise<SubmitAttempt> {
    if (!this.connection.isLive()) {
      logger.error(`Cannot submit ${this.functionName}: ${this.connection.name} is not connected`, {
        nonce: event.nonce
      });
      return { delivered: false, resubmittable: true };
    }

    try {
      const { recipient, amount, nonce } = event;

      logger.info(
        `Preparing ${this.functionName} for recipient ${recipient} with amount ${amount} and nonce ${nonce}`
      );

      const result = await this.contract.invoke(this.functionName, [recipient, amount, nonce]);
      if (!result.ok) {
        logger.error(`${this.functionName} failed for source nonce ${nonce}: ${result.error.message}`, {
          kind: result.error.kind,
          txHash: result.error.transactionHash,
          sourceTxHash: event.transactionHash
        });
        return { delivered: false, resubmittable: result.error.kind !== 'unconfirmed' };
      }

      logger.info(`${this.functionName} for source nonce ${nonce} submitted`, {
        txHash: result.value.transactionHash,
        simulated: result.value.simulated
      });
      return { delivered: true };
    } catch (error) {
      logger.error(`Failed to submit ${this.functionName} for nonce ${event.nonce}: ${describeError(error)}`);
      return { delivered: false, resubmittable: false };
    }
  }
}
