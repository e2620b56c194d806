import { ethers } from 'ethers';
import { InMemorySeenKeyStore, SeenKeyStore } from '../store/SeenKeyStore';
import { NormalizedEvent, RawEvent } from '../types';
import { logger } from '../utils/logger';

const REQUIRED_FIELDS = ['recipient', 'amount', 'nonce'] as const;

/**
 * Interpret a decoded argument as an unsigned integer
 */
export function toUnsignedInteger(value: unknown): bigint | undefined {
  if (typeof value === 'bigint') {
    return value >= 0n ? value : undefined;
  }
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && value >= 0 ? BigInt(value) : undefined;
  }
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    return BigInt(value);
  }
  return undefined;
}

/**
 * Turns raw lock events into NormalizedEvents, dropping malformed records and
 * replays. A nonce is consumed as soon as its event passes validation, whether
 * or not the unlock that follows succeeds.
 */
export class EventValidator {
  constructor(private seenKeys: SeenKeyStore = new InMemorySeenKeyStore()) {}

  public get consumedCount(): number {
    return this.seenKeys.size;
  }

  public hasConsumed(nonce: bigint): boolean {
    return this.seenKeys.has(nonce.toString());
  }

  public process(raw: RawEvent): NormalizedEvent | undefined {
    const { args } = raw;
    const context = { txHash: raw.transactionHash, blockNumber: raw.blockNumber };

    if (args.nonce === undefined || args.nonce === null) {
      logger.warn('Skipping event with no nonce', context);
      return undefined;
    }

    const nonce = toUnsignedInteger(args.nonce);
    if (nonce === undefined) {
      logger.error(`Skipping event with malformed nonce: ${String(args.nonce)}`, context);
      return undefined;
    }

    const key = nonce.toString();
    if (this.seenKeys.has(key)) {
      logger.warn(`Replay detected. Nonce ${key} has already been processed. Skipping.`, context);
      return undefined;
    }

    const missing = REQUIRED_FIELDS.filter(field => args[field] === undefined || args[field] === null);
    if (missing.length > 0) {
      logger.error(`Event is missing required fields: ${missing.join(', ')}`, context);
      return undefined;
    }

    const { recipient } = args;
    if (typeof recipient !== 'string' || !ethers.utils.isAddress(recipient)) {
      logger.error(`Event has an invalid recipient: ${String(recipient)}`, context);
      return undefined;
    }

    const amount = toUnsignedInteger(args.amount);
    if (amount === undefined) {
      logger.error(`Event has an invalid amount: ${String(args.amount)}`, context);
      return undefined;
    }

    const event: NormalizedEvent = {
      recipient: ethers.utils.getAddress(recipient),
      amount,
      nonce,
      transactionHash: raw.transactionHash,
      blockNumber: raw.blockNumber
    };

    this.seenKeys.add(key);
    logger.info(`Validated event for nonce ${key}`, context);
    return event;
  }
}
