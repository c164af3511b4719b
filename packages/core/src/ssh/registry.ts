/**
 * Session Registry
 * Child sessions opened through a parent session, keyed by (host, port, user)
 */

/**
 * Identity of a child session under a given parent
 */
export interface SessionKey {
  readonly host: string;
  readonly port: number;
  readonly username: string;
}

/**
 * Anything the registry can hold
 */
export interface RegisteredSession {
  isActive(): boolean;
  close(): void;
}

/**
 * Normalize a key so that host and user names compare case-insensitively
 */
export function createSessionKey(host: string, port: number, username: string): SessionKey {
  return {
    host: host.trim().toLowerCase(),
    port,
    username: username.trim().toLowerCase(),
  };
}

/**
 * Whether two keys name the same (host, port, user)
 */
export function sameSessionKey(a: SessionKey, b: SessionKey): boolean {
  return (
    a.port === b.port &&
    a.host.trim().toLowerCase() === b.host.trim().toLowerCase() &&
    a.username.trim().toLowerCase() === b.username.trim().toLowerCase()
  );
}

/**
 * Map key of a session key
 */
export function sessionKeyId(key: SessionKey): string {
  return JSON.stringify([key.host, key.port, key.username]);
}

export class SessionRegistry<T extends RegisteredSession> {
  private entries = new Map<string, { key: SessionKey; session: T }>();

  /**
   * Return the live session registered under `key`.
   * A registered session that is no longer active is dropped and never returned.
   */
  public get(key: SessionKey): T | undefined {
    const id = sessionKeyId(createSessionKey(key.host, key.port, key.username));
    const entry = this.entries.get(id);
    if (!entry || !sameSessionKey(entry.key, key)) {
      return undefined;
    }
    if (entry.session.isActive()) {
      return entry.session;
    }
    this.entries.delete(id);
    return undefined;
  }

  public set(key: SessionKey, session: T): void {
    const normalized = createSessionKey(key.host, key.port, key.username);
    this.entries.set(sessionKeyId(normalized), { key: normalized, session });
  }

  public keys(): SessionKey[] {
    return Array.from(this.entries.values(), (entry) => entry.key);
  }

  public get size(): number {
    return this.entries.size;
  }

  /**
   * Close every registered session; closing an already closed session is harmless
   */
  public closeAll(): void {
    for (const { session } of this.entries.values()) {
      session.close();
    }
  }
}
