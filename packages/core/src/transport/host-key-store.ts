/**
 * In-memory host key store
 * Trusts a host key the first time it is seen and rejects a different key afterwards
 */

export interface HostKeyStore {
  verify(host: string, port: number, fingerprint: string): boolean;
  clear(): void;
  readonly size: number;
}

export interface MemoryHostKeyStoreOptions {
  readonly trustOnFirstUse?: boolean;
}

export function createMemoryHostKeyStore(options: MemoryHostKeyStoreOptions = {}): HostKeyStore {
  const seen = new Map<string, string>();
  const trustOnFirstUse = options.trustOnFirstUse ?? true;

  return {
    verify(host, port, fingerprint) {
      const key = canonicalHostKeyId(host, port);
      const existing = seen.get(key);
      if (existing === undefined) {
        if (trustOnFirstUse) {
          seen.set(key, fingerprint);
          return true;
        }
        return false;
      }
      return existing === fingerprint;
    },
    clear() {
      seen.clear();
    },
    get size() {
      return seen.size;
    },
  };
}

function canonicalHostKeyId(host: string, port: number): string {
  return `${host.toLowerCase()}:${port}`;
}
