import { DESTINATION_BRIDGE_ABI, LOCK_EVENT_NAME, SOURCE_BRIDGE_ABI } from '../abi';
import { ContractHandle } from '../chain/ContractHandle';
import { ChainEndpoint, JsonRpcLedgerConnection, LedgerConnection } from '../chain/LedgerConnection';
import { RelayerConfig } from '../config/types';
import { RelayError, RelayErrorKind, classifyError, describeError } from '../errors';
import { SeenKeyStore } from '../store/SeenKeyStore';
import { NormalizedEvent, RelayState } from '../types';
import { logger } from '../utils/logger';
import { sleep } from '../utils/sleep';
import { ActionSubmitter } from './ActionSubmitter';
import { EventValidator } from './EventValidator';

export type ChainRole = 'source' | 'destination';

export type ConnectionFactory = (endpoint: ChainEndpoint, role: ChainRole) => LedgerConnection;

export interface RelayOrchestratorOptions {
  connectionFactory?: ConnectionFactory;
  seenKeys?: SeenKeyStore;
}

export type IterationStatus = 'height-unavailable' | 'idle' | 'scanned' | 'failed';

export interface BlockRange {
  fromBlock: number;
  toBlock: number;
}

export interface IterationOutcome {
  status: IterationStatus;
  /** How long to wait before the next iteration */
  delayMs: number;
  range?: BlockRange;
  /** Events that passed validation */
  accepted: number;
  /** Unlocks reported successful, redeliveries included */
  submitted: number;
  /** Unlocks that failed, redeliveries included */
  failed: number;
  errorKind?: RelayErrorKind;
}

interface PendingDelivery {
  event: NormalizedEvent;
  attemptsLeft: number;
}

interface Pipeline {
  sourceContract: ContractHandle;
  submitter: ActionSubmitter;
}

/**
 * Polls the source bridge for lock events and relays each new one to the
 * destination bridge.
 *
 * The cursor is the last source block fully scanned. It moves to the end of
 * a range once every event in that range has been dispatched, whatever the
 * submission outcomes were.
 */
export class RelayOrchestrator {
  private state: RelayState = 'initializing';
  private cursor = 0;
  private source: LedgerConnection;
  private destination: LedgerConnection;
  private validator: EventValidator;
  private pipeline: Pipeline | undefined;
  private redeliveries: PendingDelivery[] = [];

  constructor(
    private config: RelayerConfig,
    options: RelayOrchestratorOptions = {}
  ) {
    const connectionFactory: ConnectionFactory =
      options.connectionFactory ?? (endpoint => new JsonRpcLedgerConnection(endpoint));

    this.source = connectionFactory({ name: config.source.name, rpcUrl: config.source.rpcUrl }, 'source');
    this.destination = connectionFactory(
      { name: config.destination.name, rpcUrl: config.destination.rpcUrl },
      'destination'
    );
    this.validator = new EventValidator(options.seenKeys);
  }

  public getState(): RelayState {
    return this.state;
  }

  public getCursor(): number {
    return this.cursor;
  }

  public get pendingRedeliveries(): number {
    return this.redeliveries.length;
  }

  /**
   * Connect both chains, bind both contracts and place the cursor. Failure is
   * terminal: the relay moves to `faulted` and never runs.
   */
  public async initialize(): Promise<boolean> {
    if (this.state !== 'initializing') {
      return this.state === 'running';
    }

    await this.source.connect();
    await this.destination.connect();

    if (!this.source.isLive() || !this.destination.isLive()) {
      return this.fault('One or both chains are not connected. Aborting.');
    }

    const sourceContract = this.source.getContractHandle(this.config.source.contractAddress, SOURCE_BRIDGE_ABI);
    const destinationContract = this.destination.getContractHandle(
      this.config.destination.contractAddress,
      DESTINATION_BRIDGE_ABI
    );
    if (!sourceContract || !destinationContract) {
      return this.fault('Could not bind one or both bridge contracts. Check addresses. Aborting.');
    }

    if (this.config.startBlock !== undefined) {
      this.cursor = this.config.startBlock;
    } else {
      const latest = await this.source.latestHeight();
      if (latest === undefined) {
        return this.fault(`Could not read the latest block of ${this.source.name}. Aborting.`);
      }
      this.cursor = Math.max(0, latest - this.config.startBlockLag);
    }

    this.pipeline = {
      sourceContract,
      submitter: new ActionSubmitter(this.destination, destinationContract)
    };
    this.state = 'running';
    logger.info(`Relay initialized. Will start scanning after block ${this.cursor}.`);
    return true;
  }

  /**
   * Run until `signal` aborts. The signal is observed between iterations and
   * cuts short the wait between them; an in-flight RPC call is not interrupted.
   */
  public async run(signal: AbortSignal): Promise<RelayState> {
    if (!(await this.initialize())) {
      return this.state;
    }

    logger.info('Starting event polling loop');
    while (!signal.aborted) {
      const outcome = await this.runIteration();
      await sleep(outcome.delayMs, signal);
    }

    this.state = 'stopped';
    logger.info('Relay stopped', { cursor: this.cursor });
    return this.state;
  }

  /**
   * One poll/validate/submit pass. Never throws once initialized: failures are
   * classified and turned into a backoff delay, with the cursor left where
   * the last completed range put it.
   */
  public async runIteration(): Promise<IterationOutcome> {
    const { pipeline } = this;
    if (this.state !== 'running' || !pipeline) {
      throw new RelayError('initialization', `Relay is ${this.state}, not running`);
    }

    const outcome: IterationOutcome = {
      status: 'scanned',
      delayMs: this.config.pollingIntervalMs,
      accepted: 0,
      submitted: 0,
      failed: 0
    };

    try {
      await this.redeliver(pipeline.submitter, outcome);

      const latest = await this.source.latestHeight();
      if (latest === undefined) {
        logger.warn('Could not fetch latest block from source chain. Retrying after delay.');
        return { ...outcome, status: 'height-unavailable', delayMs: this.config.rpcFailureBackoffMs };
      }

      if (this.cursor >= latest) {
        return { ...outcome, status: 'idle', delayMs: this.config.idleDelayMs };
      }

      const range: BlockRange = { fromBlock: this.cursor + 1, toBlock: latest };
      logger.info(`Scanning for ${LOCK_EVENT_NAME} events from block ${range.fromBlock} to ${range.toBlock}`);

      const events = await pipeline.sourceContract.readEvents(LOCK_EVENT_NAME, range.fromBlock, range.toBlock);
      if (events.length === 0) {
        logger.info(`No new ${LOCK_EVENT_NAME} events found in this range`);
      } else {
        logger.info(`Found ${events.length} new event(s) to process`);
      }

      let destinationChecked = false;
      for (const raw of events) {
        const event = this.validator.process(raw);
        if (!event) {
          continue;
        }
        outcome.accepted++;

        if (!destinationChecked) {
          await this.destination.checkLiveness();
          destinationChecked = true;
        }
        await this.deliver(pipeline.submitter, event, this.config.redeliveryAttempts, outcome);
      }

      this.advanceCursor(range.toBlock);
      return { ...outcome, range };
    } catch (error) {
      const errorKind = classifyError(error);
      const delayMs = errorKind === 'connectivity' ? this.config.rpcFailureBackoffMs : this.config.errorBackoffMs;
      logger.error(`Error in polling iteration: ${describeError(error)}`, {
        kind: errorKind,
        cursor: this.cursor,
        retryInMs: delayMs
      });
      return { ...outcome, status: 'failed', delayMs, errorKind };
    }
  }

  private async deliver(
    submitter: ActionSubmitter,
    event: NormalizedEvent,
    attemptsLeft: number,
    outcome: IterationOutcome
  ): Promise<void> {
    const attempt = await submitter.attempt(event);
    if (attempt.delivered) {
      outcome.submitted++;
      logger.info(`Unlock delivered for nonce ${event.nonce}`, { sourceTxHash: event.transactionHash });
      return;
    }

    outcome.failed++;
    if (!attempt.resubmittable) {
      logger.error(`Unlock for nonce ${event.nonce} may have been sent; it will not be resubmitted`, {
        critical: true,
        sourceTxHash: event.transactionHash,
        sourceBlock: event.blockNumber
      });
    } else if (attemptsLeft > 0) {
      this.redeliveries.push({ event, attemptsLeft });
      logger.warn(`Unlock for nonce ${event.nonce} failed; queued for redelivery`, { attemptsLeft });
    } else {
      logger.error(`Unlock for nonce ${event.nonce} failed and will not be retried; the nonce stays consumed`, {
        sourceTxHash: event.transactionHash,
        sourceBlock: event.blockNumber
      });
    }
  }

  private async redeliver(submitter: ActionSubmitter, outcome: IterationOutcome): Promise<void> {
    if (this.redeliveries.length === 0) {
      return;
    }

    const pending = this.redeliveries;
    this.redeliveries = [];
    await this.destination.checkLiveness();

    for (const { event, attemptsLeft } of pending) {
      logger.info(`Redelivering unlock for nonce ${event.nonce}`, { attemptsLeft });
      await this.deliver(submitter, event, attemptsLeft - 1, outcome);
    }
  }

  private advanceCursor(toBlock: number): void {
    this.cursor = Math.max(this.cursor, toBlock);
  }

  private fault(message: string): false {
    this.state = 'faulted';
    logger.error(message, { critical: true });
    return false;
  }
}
