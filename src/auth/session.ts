import { ClientError } from '../errors/index.js';
import type { CredentialProvider } from './credential-provider.js';

export interface ClientSessionOptions {
  userAgent: string;
  /** Extra headers sent with every request */
  headers?: Record<string, string>;
}

/**
 * Default headers and login state shared by every request of a client
 */
export class ClientSession {
  private readonly options: ClientSessionOptions;
  private headers: Record<string, string>;
  private provider: CredentialProvider | undefined;

  constructor(options: ClientSessionOptions, provider?: CredentialProvider) {
    this.options = options;
    this.headers = this.defaultHeaders();
    this.provider = provider;
  }

  getHeaders(): Record<string, string> {
    return { ...this.headers };
  }

  setHeader(name: string, value: string): void {
    this.removeHeader(name);
    this.headers[name] = value;
  }

  /**
   * Removes a header regardless of the case it was set with
   */
  removeHeader(name: string): void {
    const lower = name.toLowerCase();
    for (const key of Object.keys(this.headers)) {
      if (key.toLowerCase() === lower) {
        delete this.headers[key];
      }
    }
  }

  /**
   * Restore the default headers. Login state is kept.
   */
  reset(): void {
    this.headers = this.defaultHeaders();
  }

  login(provider: CredentialProvider): void {
    this.provider = provider;
  }

  logout(): void {
    this.provider = undefined;
  }

  isLoggedIn(): boolean {
    return this.provider !== undefined;
  }

  getCredentialProvider(): CredentialProvider | undefined {
    return this.provider;
  }

  /**
   * Guard for operations that need a logged-in session
   * @throws ClientError with reason `not_logged_in`
   */
  requireLogin(operation: string): CredentialProvider {
    if (!this.provider) {
      throw ClientError.notLoggedIn(operation);
    }
    return this.provider;
  }

  private defaultHeaders(): Record<string, string> {
    return {
      'Accept': 'application/json',
      'Accept-Language': 'en-US,en;q=1',
      'Content-Type': 'application/json',
      'User-Agent': this.options.userAgent,
      ...this.options.headers,
    };
  }
}
