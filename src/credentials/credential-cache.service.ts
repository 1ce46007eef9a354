import { Injectable, Logger } from '@nestjs/common';

export interface IssuedCredential {
  token: string;
  expiresAt: Date;
}

interface CachedCredential extends IssuedCredential {
  refreshAt: number; // Epoch ms after which the credential is re-issued
}

export type CredentialIssuer = () => Promise<IssuedCredential>;

/**
 * Credential Cache Service
 *
 * Process-wide cache for short-lived credentials (signed URLs, speech or
 * storage tokens) keyed by purpose. A credential is re-issued once it is
 * within the refresh margin of its expiry.
 *
 * Concurrent callers for the same key share one in-flight issue call.
 *
 * Security Considerations:
 * - Cache is in-memory (per-instance)
 * - Tokens are never logged
 */
@Injectable()
export class CredentialCacheService {
  private readonly logger = new Logger(CredentialCacheService.name);
  private readonly cache = new Map<string, CachedCredential>();
  private readonly inFlight = new Map<string, Promise<IssuedCredential>>();
  private readonly refreshMarginMs: number;

  constructor() {
    this.refreshMarginMs =
      parseInt(process.env.CREDENTIAL_CACHE_REFRESH_MARGIN_SECONDS || '60', 10) *
      1000;
  }

  /**
   * Return the cached credential for `key`, or issue a new one.
   * A rejected issue call is not cached.
   */
  async getOrIssue(
    key: string,
    issuer: CredentialIssuer,
  ): Promise<IssuedCredential> {
    const cached = this.get(key);
    if (cached) {
      return cached;
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const issuing = this.issue(key, issuer);
    this.inFlight.set(key, issuing);
    try {
      return await issuing;
    } finally {
      this.inFlight.delete(key);
    }
  }

  get(key: string): IssuedCredential | null {
    const cached = this.cache.get(key);
    if (!cached) {
      return null;
    }

    if (Date.now() >= cached.refreshAt) {
      this.cache.delete(key);
      return null;
    }

    return { token: cached.token, expiresAt: cached.expiresAt };
  }

  invalidate(key: string): void {
    this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }

  /**
   * Get cache statistics (for monitoring)
   */
  getStats(): { size: number; refreshMarginMs: number } {
    return {
      size: this.cache.size,
      refreshMarginMs: this.refreshMarginMs,
    };
  }

  private async issue(
    key: string,
    issuer: CredentialIssuer,
  ): Promise<IssuedCredential> {
    const credential = await issuer();
    const refreshAt = credential.expiresAt.getTime() - this.refreshMarginMs;

    if (refreshAt > Date.now()) {
      this.cache.set(key, { ...credential, refreshAt });
    } else {
      this.logger.warn(
        `[CREDENTIALS] Credential for '${key}' expires within the refresh margin; not cached`,
      );
    }

    return credential;
  }
}
