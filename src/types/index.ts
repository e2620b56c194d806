/**
 * Event record as read from the source chain, before validation.
 * `args` holds the decoded event arguments by name; values that were
 * ethers BigNumbers arrive as bigint.
 */
export interface RawEvent {
  transactionHash: string;
  blockNumber: number;
  logIndex: number;
  args: Readonly<Record<string, unknown>>;
}

/**
 * A validated lock event, ready to be relayed
 */
export interface NormalizedEvent {
  /** Checksummed recipient address */
  recipient: string;
  amount: bigint;
  /** Uniqueness key of the transfer on the source chain */
  nonce: bigint;
  transactionHash: string;
  blockNumber: number;
}

export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/**
 * Reference to the outcome of a state-changing call
 */
export interface ReceiptRef {
  transactionHash: string;
  blockNumber?: number;
  /** True when no transaction was actually broadcast */
  simulated: boolean;
}

/**
 * - `unreachable`: nothing reached the node
 * - `rejected`: the node refused the call
 * - `reverted`: mined, with a failed status
 * - `unconfirmed`: broadcast, outcome unknown; submitting again may duplicate it
 */
export type SubmissionErrorKind = 'unreachable' | 'rejected' | 'reverted' | 'unconfirmed';

export interface SubmissionError {
  kind: SubmissionErrorKind;
  message: string;
  /** Hash of the transaction, once signed */
  transactionHash?: string;
}

export type RelayState = 'initializing' | 'running' | 'stopped' | 'faulted';
