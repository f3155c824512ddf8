import { describe, it, expect } from 'vitest';
import { createMockCredentialProvider } from '../../__mocks__/index.js';
import { ClientError } from '../../errors/index.js';
import { ClientSession } from '../session.js';

describe('ClientSession', () => {
  it('should start with the default headers', () => {
    const session = new ClientSession({ userAgent: 'brokerage-gateway-test', headers: { 'X-Client': 'desk' } });

    expect(session.getHeaders()).toEqual({
      'Accept': 'application/json',
      'Accept-Language': 'en-US,en;q=1',
      'Content-Type': 'application/json',
      'User-Agent': 'brokerage-gateway-test',
      'X-Client': 'desk',
    });
  });

  it('should hand out copies of its headers', () => {
    const session = new ClientSession({ userAgent: 'brokerage-gateway-test' });

    session.getHeaders()['X-Injected'] = 'yes';

    expect(session.getHeaders()['X-Injected']).toBeUndefined();
  });

  it('should replace headers regardless of case', () => {
    const session = new ClientSession({ userAgent: 'brokerage-gateway-test' });

    session.setHeader('accept', 'text/csv');

    const headers = session.getHeaders();
    expect(headers['accept']).toBe('text/csv');
    expect(headers['Accept']).toBeUndefined();
  });

  it('should restore the defaults on reset and keep the login', () => {
    const session = new ClientSession({ userAgent: 'brokerage-gateway-test' }, createMockCredentialProvider());
    session.removeHeader('ACCEPT-LANGUAGE');

    session.reset();

    expect(session.getHeaders()['Accept-Language']).toBe('en-US,en;q=1');
    expect(session.isLoggedIn()).toBe(true);
  });

  it('should track login state', () => {
    const session = new ClientSession({ userAgent: 'brokerage-gateway-test' });
    const provider = createMockCredentialProvider();

    expect(session.isLoggedIn()).toBe(false);
    session.login(provider);
    expect(session.getCredentialProvider()).toBe(provider);
    expect(session.requireLogin('GET /accounts/')).toBe(provider);

    session.logout();
    expect(session.isLoggedIn()).toBe(false);
  });

  it('should refuse guarded operations when logged out', () => {
    const session = new ClientSession({ userAgent: 'brokerage-gateway-test' });

    expect(() => session.requireLogin('GET /accounts/')).toThrow(ClientError);
    expect(() => session.requireLogin('GET /accounts/')).toThrow('GET /accounts/ can only be called when logged in');
  });
});
