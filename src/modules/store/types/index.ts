/**
 * Store Module Type Definitions
 */

export type BackendKind = 'memory' | 'redis';

/**
 * String key -> JSON string value storage with optional per-key expiry
 * Implemented by the in-process map and by Redis; chosen once at start-up
 */
export interface KeyValueBackend {
  readonly kind: BackendKind;
  get(key: string): Promise<string | undefined>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  delete(key: string): Promise<void>;
  /** Keys beginning with prefix (full keys, prefix included) */
  keys(prefix: string): Promise<string[]>;
  close(): Promise<void>;
}
