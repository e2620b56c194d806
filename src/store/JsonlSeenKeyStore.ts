/**
 * File-backed SeenKeyStore.
 *
 * Keys are appended as one JSON object per line and fsynced before `add`
 * returns, so a key is durable before the event it guards is relayed.
 * On start the file is replayed; a torn or corrupt line (typically the last
 * one after a crash mid-write) is skipped, and a torn tail is terminated so
 * the next record starts on a line of its own.
 *
 * Line format: {"key":"42","seenAt":"2024-01-01T00:00:00.000Z"}
 */

import {
  appendFileSync,
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
} from 'fs';
import { dirname } from 'path';
import { logger } from '../utils/logger';
import { SeenKeyStore } from './SeenKeyStore';

export interface JsonlSeenKeyStoreOptions {
  filePath: string;
}

function parseLine(line: string): string | undefined {
  try {
    const record: unknown = JSON.parse(line);
    if (typeof record === 'object' && record !== null && 'key' in record && typeof record.key === 'string') {
      return record.key;
    }
  } catch {
    // reported by the caller
  }
  return undefined;
}

export class JsonlSeenKeyStore implements SeenKeyStore {
  private readonly filePath: string;
  private readonly keys = new Set<string>();

  constructor(options: JsonlSeenKeyStoreOptions) {
    this.filePath = options.filePath;
    mkdirSync(dirname(this.filePath), { recursive: true });
    this.load();
  }

  public has(key: string): boolean {
    return this.keys.has(key);
  }

  public add(key: string): void {
    if (this.keys.has(key)) {
      return;
    }

    this.appendDurably(JSON.stringify({ key, seenAt: new Date().toISOString() }) + '\n');

    // Memory follows the file, never the other way round
    this.keys.add(key);
  }

  public get size(): number {
    return this.keys.size;
  }

  private load(): void {
    if (!existsSync(this.filePath)) {
      return;
    }

    const content = readFileSync(this.filePath, 'utf-8');
    const lines = content.split('\n');
    let skipped = 0;

    for (const line of lines) {
      if (line.trim() === '') {
        continue;
      }
      const key = parseLine(line);
      if (key === undefined) {
        skipped++;
        continue;
      }
      this.keys.add(key);
    }

    if (skipped > 0) {
      logger.warn(`Skipped ${skipped} unreadable line(s) in seen-key store`, { filePath: this.filePath });
    }
    if (content.length > 0 && !content.endsWith('\n')) {
      this.appendDurably('\n');
    }
    logger.info(`Loaded ${this.keys.size} seen key(s)`, { filePath: this.filePath });
  }

  private appendDurably(text: string): void {
    const fd = openSync(this.filePath, 'a');
    try {
      appendFileSync(fd, text, 'utf-8');
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }
}
