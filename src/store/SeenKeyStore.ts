/**
 * Set of uniqueness keys already accepted by the relay. It only ever grows.
 */
export interface SeenKeyStore {
  has(key: string): boolean;
  add(key: string): void;
  readonly size: number;
}

/**
 * Process-lifetime store. A restart forgets every key.
 */
export class InMemorySeenKeyStore implements SeenKeyStore {
  private keys = new Set<string>();

  constructor(initial: Iterable<string> = []) {
    for (const key of initial) {
      this.keys.add(key);
    }
  }

  public has(key: string): boolean {
    return this.keys.has(key);
  }

  public add(key: string): void {
    this.keys.add(key);
  }

  public get size(): number {
    return this.keys.size;
  }
}
