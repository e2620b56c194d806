// src/config/types.ts

/**
 * One side of the bridge
 */
export interface ChainConfig {
  /** Chain label used in logs */
  name: string;
  /** RPC URL for chain */
  rpcUrl: string;
  /** Bridge contract address on this chain */
  contractAddress: string;
}

export type SubmissionMode = 'simulated' | 'wallet';

/**
 * How unlock transactions reach the destination chain
 */
export interface SubmissionConfig {
  /** `simulated` logs the call without broadcasting; `wallet` signs with PRIVATE_KEY */
  mode: SubmissionMode;
  /** Artificial confirmation delay in simulated mode */
  simulatedLatencyMs: number;
  /** Blocks to wait for after inclusion */
  confirmations: number;
  /** Longest single wait for a receipt; 0 waits indefinitely */
  receiptTimeoutMs: number;
  /** Fixed gas limit; estimated when unset */
  gasLimit?: number;
  /** Broadcast retries for transient errors */
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
}

/**
 * Main configuration structure
 */
export interface RelayerConfig {
  source: ChainConfig;
  destination: ChainConfig;
  /** Initial cursor (last block treated as scanned); defaults to latest - startBlockLag */
  startBlock?: number;
  startBlockLag: number;
  /** Sleep after a scanned range */
  pollingIntervalMs: number;
  /** Sleep when no new block has been produced */
  idleDelayMs: number;
  /** Sleep after a connectivity failure */
  rpcFailureBackoffMs: number;
  /** Sleep after any other iteration failure */
  errorBackoffMs: number;
  /** Later attempts for an unlock whose submission failed; 0 relays at most once */
  redeliveryAttempts: number;
  /** JSONL file for durable replay protection; in-memory when unset */
  seenKeysPath?: string;
  submission: SubmissionConfig;
}

/**
 * Environment variables structure
 */
export interface EnvVars {
  SOURCE_CHAIN_RPC_URL?: string;
  DESTINATION_CHAIN_RPC_URL?: string;
  SOURCE_CONTRACT_ADDRESS?: string;
  DESTINATION_CONTRACT_ADDRESS?: string;
  START_BLOCK?: string;
  POLLING_INTERVAL_MS?: string;
  SUBMISSION_MODE?: string;
  /** Private key for transaction signing */
  PRIVATE_KEY?: string;
  SEEN_KEYS_PATH?: string;
  REDELIVERY_ATTEMPTS?: string;
  CONFIG_PATH?: string;
  /** Log level */
  LOG_LEVEL?: string;
}
