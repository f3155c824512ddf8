import { vi } from 'vitest';
import type { Credential, CredentialProvider, GetCredentialOptions } from '../auth/credential-provider.js';

function createGetCredentialMock(token: string) {
  return vi.fn(async (options?: GetCredentialOptions): Promise<Credential> => ({
    tokenType: 'Bearer',
    accessToken: options?.forceRefresh ? `${token}-refreshed` : token,
  }));
}

export interface MockCredentialProvider extends CredentialProvider {
  getCredential: ReturnType<typeof createGetCredentialMock>;
}

/**
 * Provider returning `token`, or `<token>-refreshed` on a forced refresh
 */
export function createMockCredentialProvider(token = 'test-token'): MockCredentialProvider {
  return { getCredential: createGetCredentialMock(token) };
}

export function mockCredentialFailure(provider: MockCredentialProvider, error: Error): void {
  provider.getCredential.mockRejectedValue(error);
}
