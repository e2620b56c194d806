import { ethers } from 'ethers';
import { InvokerFactory, JsonRpcLedgerConnection, ProviderFactory } from './chain/LedgerConnection';
import { SimulatedInvoker, WalletInvoker } from './chain/invokers';
import { RelayerConfig } from './config/types';
import { ConfigError } from './errors';
import { ConnectionFactory, RelayOrchestrator } from './services/RelayOrchestrator';
import { JsonlSeenKeyStore } from './store/JsonlSeenKeyStore';
import { InMemorySeenKeyStore, SeenKeyStore } from './store/SeenKeyStore';
import { RelayState } from './types';
import { logger } from './utils/logger';

/**
 * Builds the invoker every destination contract handle submits through
 */
export function createInvokerFactory(config: RelayerConfig, privateKey?: string): InvokerFactory {
  const { submission } = config;

  if (submission.mode === 'simulated') {
    return (_provider, chainName) => new SimulatedInvoker(chainName, submission.simulatedLatencyMs);
  }

  if (!privateKey) {
    throw new ConfigError('A private key is required in wallet submission mode');
  }
  const signerKey = privateKey;
  return (provider: ethers.providers.JsonRpcProvider, chainName: string) =>
    new WalletInvoker(chainName, signerKey, provider, {
      confirmations: submission.confirmations,
      receiptTimeoutMs: submission.receiptTimeoutMs,
      gasLimit: submission.gasLimit,
      retry: {
        maxRetries: submission.maxRetries,
        baseDelayMs: submission.retryBaseDelayMs,
        maxDelayMs: submission.retryMaxDelayMs
      }
    });
}

/**
 * Only the destination submits, so only its handles get the configured invoker
 */
export function createConnectionFactory(
  invokerFactory: InvokerFactory,
  providerFactory?: ProviderFactory
): ConnectionFactory {
  return (endpoint, role) =>
    new JsonRpcLedgerConnection(
      endpoint,
      role === 'destination' ? { providerFactory, invokerFactory } : { providerFactory }
    );
}

export function createSeenKeyStore(config: RelayerConfig): SeenKeyStore {
  if (config.seenKeysPath) {
    return new JsonlSeenKeyStore({ filePath: config.seenKeysPath });
  }
  logger.warn('No seen-key path configured; replay protection is lost on restart');
  return new InMemorySeenKeyStore();
}

/**
 * Main application class that owns the relay and its lifecycle
 */
export class BridgeRelayerApp {
  private orchestrator: RelayOrchestrator;
  private controller: AbortController | undefined;

  /**
   * @param privateKey Destination signer key; only used in wallet submission mode
   */
  constructor(config: RelayerConfig, privateKey?: string) {
    logger.info('Initializing bridge relayer');

    this.orchestrator = new RelayOrchestrator(config, {
      connectionFactory: createConnectionFactory(createInvokerFactory(config, privateKey)),
      seenKeys: createSeenKeyStore(config)
    });
  }

  /**
   * Runs the relay; resolves with its final state once stopped, or at once
   * when initialization fails
   */
  public async start(): Promise<RelayState> {
    if (this.controller) {
      logger.warn('Relayer is already running');
      return this.orchestrator.getState();
    }

    this.controller = new AbortController();
    return this.orchestrator.run(this.controller.signal);
  }

  public stop(): void {
    if (!this.controller || this.controller.signal.aborted) {
      logger.warn('Relayer is not running');
      return;
    }

    logger.info('Shutdown signal received. Stopping relayer...');
    this.controller.abort();
  }
}
