/**
 * Minimal key-value contract with per-entry TTL; entries leave only by
 * expiring. Values are opaque strings, callers serialise their own payloads.
 */
export interface Cache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
}
