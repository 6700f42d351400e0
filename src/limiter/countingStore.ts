/**
 * The shared store every service instance counts against.
 *
 * `hit` records one occurrence for `key` at `nowSeconds`, evicts entries
 * older than the window and resolves with the number of entries left,
 * the new one included. All of it happens as one atomic unit per key.
 */
export interface CountingStore {
  hit(key: string, nowSeconds: number, windowSeconds: number): Promise<number>;
}
