import { ethers } from 'ethers';
import { describeError } from '../errors';
import { logger } from '../utils/logger';
import { ContractHandle, EthersContractHandle } from './ContractHandle';
import { SimulatedInvoker, TransactionInvoker } from './invokers';

export type ConnectionState = 'connected' | 'disconnected';

/**
 * Connectivity to one ledger node. No operation throws: failures are logged
 * and show up as a disconnected state or an absent result.
 */
export interface LedgerConnection {
  readonly name: string;
  readonly rpcUrl: string;

  /** (Re)establish connectivity; leaves the connection disconnected on failure */
  connect(): Promise<void>;

  /** Connectivity as last observed by any call through this connection */
  isLive(): boolean;

  /** Probe the node and refresh the connectivity state */
  checkLiveness(): Promise<boolean>;

  latestHeight(): Promise<number | undefined>;

  getContractHandle(address: string, abi: readonly string[]): ContractHandle | undefined;
}

/**
 * Endpoint of a chain
 */
export interface ChainEndpoint {
  /** Human-readable chain label */
  name: string;
  rpcUrl: string;
}

export type ProviderFactory = (rpcUrl: string) => ethers.providers.JsonRpcProvider;

export type InvokerFactory = (
  provider: ethers.providers.JsonRpcProvider,
  chainName: string
) => TransactionInvoker;

export interface JsonRpcLedgerConnectionOptions {
  providerFactory?: ProviderFactory;
  invokerFactory?: InvokerFactory;
}

const defaultProviderFactory: ProviderFactory = rpcUrl =>
  new ethers.providers.StaticJsonRpcProvider(rpcUrl);

const defaultInvokerFactory: InvokerFactory = (_provider, chainName) =>
  new SimulatedInvoker(chainName, 2000);

export class JsonRpcLedgerConnection implements LedgerConnection {
  public readonly name: string;
  public readonly rpcUrl: string;
  private provider: ethers.providers.JsonRpcProvider | undefined;
  private state: ConnectionState = 'disconnected';
  private providerFactory: ProviderFactory;
  private invokerFactory: InvokerFactory;

  constructor(endpoint: ChainEndpoint, options: JsonRpcLedgerConnectionOptions = {}) {
    this.name = endpoint.name;
    this.rpcUrl = endpoint.rpcUrl;
    this.providerFactory = options.providerFactory ?? defaultProviderFactory;
    this.invokerFactory = options.invokerFactory ?? defaultInvokerFactory;
  }

  public async connect(): Promise<void> {
    try {
      const provider = this.providerFactory(this.rpcUrl);
      const network = await provider.getNetwork();

      this.provider = provider;
      this.state = 'connected';
      logger.info(`Connected to ${this.name}`, { rpcUrl: this.rpcUrl, chainId: network.chainId });
    } catch (error) {
      this.provider = undefined;
      this.state = 'disconnected';
      logger.error(`Failed to connect to ${this.name}: ${describeError(error)}`, { rpcUrl: this.rpcUrl });
    }
  }

  public isLive(): boolean {
    return this.state === 'connected' && this.provider !== undefined;
  }

  public async checkLiveness(): Promise<boolean> {
    if (!this.isLive()) {
      await this.connect();
      return this.isLive();
    }

    return (await this.queryBlockNumber()) !== undefined;
  }

  public async latestHeight(): Promise<number | undefined> {
    if (!this.isLive()) {
      await this.connect();
    }

    if (!this.isLive()) {
      logger.warn(`Cannot get block number; not connected to ${this.name}`);
      return undefined;
    }

    return this.queryBlockNumber();
  }

  public getContractHandle(address: string, abi: readonly string[]): ContractHandle | undefined {
    if (!this.provider || !this.isLive()) {
      logger.warn(`Cannot get contract; not connected to ${this.name}`);
      return undefined;
    }

    if (!ethers.utils.isAddress(address)) {
      logger.error(`Invalid contract address for ${this.name}: ${address}`);
      return undefined;
    }

    const contract = new ethers.Contract(ethers.utils.getAddress(address), abi, this.provider);
    return new EthersContractHandle(this.name, contract, this.invokerFactory(this.provider, this.name));
  }

  private async queryBlockNumber(): Promise<number | undefined> {
    if (!this.provider) {
      return undefined;
    }

    try {
      const blockNumber = await this.provider.getBlockNumber();
      this.state = 'connected';
      return blockNumber;
    } catch (error) {
      this.state = 'disconnected';
      logger.error(`Error fetching block number from ${this.name}: ${describeError(error)}`);
      return undefined;
    }
  }
}
