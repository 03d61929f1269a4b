/**
 * Credential Cache Module
 *
 * Keeps caller-supplied channel secrets (bot tokens, access tokens, API keys)
 * for a while so follow-up calls do not have to resend them.
 *
 * - CredentialStore: injectable key/value store with per-entry TTL
 * - MemoryCredentialStore: Map-backed store, expiry checked lazily on read
 * - CredentialCache: placeholder-aware facade owned by a delivery service
 *
 * Entries are not persisted and have no capacity bound. Concurrent writers
 * for the same key resolve as last write wins.
 */

import type { Logger } from '../logger/index.js';
import { silentLogger } from '../logger/index.js';

/** Credentials live for 24 hours after their last write */
export const DEFAULT_CREDENTIAL_TTL_MS = 24 * 60 * 60 * 1000;

/** Values API explorers submit when a field is left at its example default */
export const PLACEHOLDER_SECRETS: ReadonlySet<string> = new Set(['string']);

/**
 * Whether a caller-supplied credential is absent or a known placeholder
 */
export function isPlaceholderSecret(value: string | null | undefined): boolean {
  if (value === null || value === undefined) return true;
  const trimmed = value.trim();
  return trimmed.length === 0 || PLACEHOLDER_SECRETS.has(trimmed);
}

/**
 * Storage backend for credentials
 */
export interface CredentialStore {
  get(key: string): string | undefined;
  put(key: string, value: string, ttlMs: number): void;
}

export interface Clock {
  now(): number;
}

const systemClock: Clock = { now: () => Date.now() };

interface CredentialEntry {
  secret: string;
  expiresAt: number;
}

/**
 * In-memory credential store
 *
 * An entry is usable only while now < expiresAt; reading it at or past
 * expiry evicts it.
 */
export class MemoryCredentialStore implements CredentialStore {
  private readonly entries = new Map<string, CredentialEntry>();

  constructor(private readonly clock: Clock = systemClock) {}

  get(key: string): string | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.clock.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }

    return entry.secret;
  }

  put(key: string, value: string, ttlMs: number): void {
    this.entries.set(key, { secret: value, expiresAt: this.clock.now() + ttlMs });
  }
}

export interface CredentialCacheOptions {
  /** Label used in log lines, e.g. "bot token" */
  kind: string;
  store?: CredentialStore;
  ttlMs?: number;
  logger?: Logger;
}

/**
 * Credential cache facade used by delivery services
 */
export class CredentialCache {
  private readonly kind: string;
  private readonly backend: CredentialStore;
  private readonly ttlMs: number;
  private readonly logger: Logger;

  constructor(options: CredentialCacheOptions) {
    this.kind = options.kind;
    this.backend = options.store ?? new MemoryCredentialStore();
    this.ttlMs = options.ttlMs ?? DEFAULT_CREDENTIAL_TTL_MS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Insert or overwrite a secret; empty or placeholder secrets are ignored
   */
  store(key: string, secret: string | null | undefined): void {
    if (!key || secret === null || secret === undefined || isPlaceholderSecret(secret)) {
      return;
    }

    this.backend.put(key, secret.trim(), this.ttlMs);
    this.logger.debug(`Stored ${this.kind}`, { key });
  }

  /**
   * Return the unexpired secret for a key, if any
   */
  lookup(key: string): string | undefined {
    if (!key) return undefined;

    const secret = this.backend.get(key);
    if (secret !== undefined) {
      this.logger.debug(`Using cached ${this.kind}`, { key });
    }
    return secret;
  }

  /**
   * Prefer a usable supplied secret (remembering it), otherwise fall back to the cache
   */
  resolve(key: string, supplied: string | null | undefined): string | undefined {
    if (supplied !== null && supplied !== undefined && !isPlaceholderSecret(supplied)) {
      this.store(key, supplied);
      return supplied.trim();
    }
    return this.lookup(key);
  }
}
