/**
 * Credential supply for authenticated requests
 */

export interface Credential {
  /** Scheme used in the Authorization header, e.g. "Bearer" */
  tokenType: string;
  accessToken: string;
  /** Epoch milliseconds after which the token must not be used */
  expiresAt?: number;
}

export interface GetCredentialOptions {
  /** Discard any cached token and obtain a new one */
  forceRefresh?: boolean;
}

/**
 * Source of access tokens. The login / token-refresh flow lives behind this interface.
 */
export interface CredentialProvider {
  getCredential(options?: GetCredentialOptions): Promise<Credential>;
}

/**
 * Formats the Authorization header value for a credential
 */
export function authorizationHeader(credential: Credential): string {
  return `${credential.tokenType} ${credential.accessToken}`;
}

/**
 * Provider for a fixed token. A forced refresh returns the same token.
 */
export class StaticCredentialProvider implements CredentialProvider {
  private readonly credential: Credential;

  constructor(credential: Credential | string) {
    this.credential = typeof credential === 'string'
      ? { tokenType: 'Bearer', accessToken: credential }
      : { ...credential };

    if (this.credential.accessToken.trim().length === 0) {
      throw new TypeError('Access token cannot be empty or whitespace');
    }
  }

  async getCredential(_options?: GetCredentialOptions): Promise<Credential> {
    return this.credential;
  }
}

export interface RefreshingCredentialProviderOptions {
  /** Obtains a fresh credential, e.g. by running the login flow */
  refresh: () => Promise<Credential>;
  /** Refresh this long before `expiresAt` (default: 30 seconds) */
  refreshSkewMs?: number;
}

/**
 * Caches the credential returned by `refresh` until it is about to expire.
 * Concurrent callers share one in-flight refresh.
 */
export class RefreshingCredentialProvider implements CredentialProvider {
  private readonly refreshFn: () => Promise<Credential>;
  private readonly refreshSkewMs: number;
  private current: Credential | undefined;
  private inflight: Promise<Credential> | undefined;
  private refreshCount = 0;

  constructor(options: RefreshingCredentialProviderOptions) {
    this.refreshFn = options.refresh;
    this.refreshSkewMs = options.refreshSkewMs ?? 30000;
  }

  async getCredential(options?: GetCredentialOptions): Promise<Credential> {
    if (!options?.forceRefresh && this.current && !this.isStale(this.current)) {
      return this.current;
    }
    return this.refresh();
  }

  /**
   * Number of completed or in-flight refresh calls
   */
  getRefreshCount(): number {
    return this.refreshCount;
  }

  /**
   * Drop the cached credential
   */
  invalidate(): void {
    this.current = undefined;
  }

  private refresh(): Promise<Credential> {
    if (this.inflight) {
      return this.inflight;
    }

    this.refreshCount++;
    const pending = this.refreshFn()
      .then(credential => {
        this.current = credential;
        return credential;
      })
      .finally(() => {
        this.inflight = undefined;
      });

    this.inflight = pending;
    return pending;
  }

  private isStale(credential: Credential): boolean {
    return credential.expiresAt !== undefined && Date.now() >= credential.expiresAt - this.refreshSkewMs;
  }
}
