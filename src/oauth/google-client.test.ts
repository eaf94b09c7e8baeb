/**
 * Unit Tests for the Google OAuth Provider
 *
 * Tests consent URL generation, token exchange, refresh, revocation and the
 * classification of Google failures. Mocks Google's OAuth2Client and fetch.
 */

// Mock google-auth-library
const mockGenerateAuthUrl = jest.fn();
const mockGetToken = jest.fn();
const mockRefreshAccessToken = jest.fn();
const mockSetCredentials = jest.fn();

jest.mock('google-auth-library', () => ({
  OAuth2Client: jest.fn().mockImplementation(() => ({
    generateAuthUrl: mockGenerateAuthUrl,
    getToken: mockGetToken,
    refreshAccessToken: mockRefreshAccessToken,
    setCredentials: mockSetCredentials,
  })),
}));

// Mock logger
jest.mock('../utils/logger', () => ({
  authLogger: {
    info: jest.fn(),
    debug: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
  },
}));

// Mock fetch
const mockFetch = jest.spyOn(global, 'fetch');

import { OAuth2Client } from 'google-auth-library';
import { ProviderRejectedError, ProviderUnavailableError } from '../auth/errors';
import { GOOGLE_REVOKE_URL } from '../constants/google-api';
import { classifyProviderError, GoogleOAuthProvider } from './google-client';

const NOW = Date.parse('2026-03-01T09:00:00Z');

function httpError(status: number, data?: unknown): Error {
  return Object.assign(new Error(`Request failed with status code ${status}`), { response: { status, data } });
}

describe('GoogleOAuthProvider', () => {
  let provider: GoogleOAuthProvider;

  beforeEach(() => {
    jest.clearAllMocks();
    provider = new GoogleOAuthProvider({
      clientId: 'test-client-id',
      clientSecret: 'test-client-secret',
      redirectUri: 'http://localhost:3000/auth/callback',
      requestTimeoutMs: 50,
      now: () => NOW,
    });
  });

  it('should configure the client with the registered credentials', () => {
    expect(OAuth2Client).toHaveBeenCalledWith(
      'test-client-id',
      'test-client-secret',
      'http://localhost:3000/auth/callback'
    );
  });

  describe('buildConsentUrl()', () => {
    it('should request offline access with the state and space-joined scopes', () => {
      mockGenerateAuthUrl.mockReturnValue('https://accounts.google.com/o/oauth2/v2/auth?state=state-1');

      const url = provider.buildConsentUrl({ scopes: ['scope:a', 'scope:b'], state: 'state-1' });

      expect(url).toBe('https://accounts.google.com/o/oauth2/v2/auth?state=state-1');
      expect(mockGenerateAuthUrl).toHaveBeenCalledWith({
        access_type: 'offline',
        prompt: 'consent',
        include_granted_scopes: true,
        response_type: 'code',
        scope: 'scope:a scope:b',
        state: 'state-1',
      });
    });
  });

  describe('exchangeCode()', () => {
    it('should exchange the code for tokens', async () => {
      mockGetToken.mockResolvedValue({
        tokens: {
          access_token: 'access-1',
          refresh_token: 'refresh-1',
          expiry_date: NOW + 3600000,
          scope: 'scope:b scope:a',
        },
      });

      const result = await provider.exchangeCode('code-1');

      expect(mockGetToken).toHaveBeenCalledWith('code-1');
      expect(result).toEqual({
        accessToken: 'access-1',
        refreshToken: 'refresh-1',
        expiresAt: NOW + 3600000,
        scopes: ['scope:a', 'scope:b'],
      });
    });

    it('should default to a one hour lifetime and omit empty fields', async () => {
      mockGetToken.mockResolvedValue({ tokens: { access_token: 'access-1', refresh_token: null } });

      const result = await provider.exchangeCode('code-1');

      expect(result).toEqual({ accessToken: 'access-1', expiresAt: NOW + 3600000 });
      expect(result).not.toHaveProperty('refreshToken');
      expect(result).not.toHaveProperty('scopes');
    });

    it('should reject a response without an access token', async () => {
      mockGetToken.mockResolvedValue({ tokens: { refresh_token: 'refresh-1' } });

      await expect(provider.exchangeCode('code-1')).rejects.toThrow('No access token received from Google');
    });

    it('should classify invalid_grant as a rejection', async () => {
      mockGetToken.mockRejectedValue(httpError(400, { error: 'invalid_grant' }));

      const error: unknown = await provider.exchangeCode('code-1').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ProviderRejectedError);
      expect(error).toMatchObject({
        message: 'Google rejected code exchange (400: invalid_grant)',
        oauthError: 'invalid_grant',
      });
    });

    it('should classify a server error as unavailability', async () => {
      mockGetToken.mockRejectedValue(httpError(503));

      await expect(provider.exchangeCode('code-1')).rejects.toThrow(ProviderUnavailableError);
    });

    it('should time out a slow token endpoint', async () => {
      mockGetToken.mockReturnValue(new Promise(() => undefined));

      await expect(provider.exchangeCode('code-1')).rejects.toThrow('Google code exchange timed out after 50ms');
    });
  });

  describe('refresh()', () => {
    it('should refresh with the given refresh token', async () => {
      mockRefreshAccessToken.mockResolvedValue({
        credentials: { access_token: 'access-2', expiry_date: NOW + 3599000 },
      });

      const result = await provider.refresh('refresh-1');

      expect(mockSetCredentials).toHaveBeenCalledWith({ refresh_token: 'refresh-1' });
      expect(result).toEqual({ accessToken: 'access-2', expiresAt: NOW + 3599000 });
    });

    it('should return a rotated refresh token', async () => {
      mockRefreshAccessToken.mockResolvedValue({
        credentials: { access_token: 'access-2', refresh_token: 'refresh-2', expiry_date: NOW + 3600000 },
      });

      await expect(provider.refresh('refresh-1')).resolves.toMatchObject({ refreshToken: 'refresh-2' });
    });

    it('should reject a response without an access token', async () => {
      mockRefreshAccessToken.mockResolvedValue({ credentials: {} });

      await expect(provider.refresh('refresh-1')).rejects.toThrow('Failed to refresh access token');
    });

    it('should classify a revoked refresh token as a rejection', async () => {
      mockRefreshAccessToken.mockRejectedValue(httpError(400, { error: 'invalid_grant' }));

      await expect(provider.refresh('refresh-1')).rejects.toMatchObject({
        name: 'ProviderRejectedError',
        oauthError: 'invalid_grant',
      });
    });

    it('should classify a network failure as unavailability', async () => {
      mockRefreshAccessToken.mockRejectedValue(new Error('getaddrinfo ENOTFOUND oauth2.googleapis.com'));

      await expect(provider.refresh('refresh-1')).rejects.toThrow(
        'Could not reach Google for token refresh: getaddrinfo ENOTFOUND oauth2.googleapis.com'
      );
    });
  });

  describe('revoke()', () => {
    it('should post the token to the revoke endpoint', async () => {
      mockFetch.mockResolvedValue(new Response(null, { status: 200 }));

      await expect(provider.revoke('refresh-1')).resolves.toBe(true);

      expect(mockFetch).toHaveBeenCalledWith(
        GOOGLE_REVOKE_URL,
        expect.objectContaining({
          method: 'POST',
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          body: 'token=refresh-1',
        })
      );
    });

    it('should report false when Google refuses', async () => {
      mockFetch.mockResolvedValue(new Response('{"error":"invalid_token"}', { status: 400 }));

      await expect(provider.revoke('refresh-1')).resolves.toBe(false);
    });

    it('should report false on network errors', async () => {
      mockFetch.mockRejectedValue(new Error('Network error'));

      await expect(provider.revoke('refresh-1')).resolves.toBe(false);
    });
  });
});

describe('classifyProviderError()', () => {
  it('should keep already classified errors', () => {
    const error = new ProviderUnavailableError();

    expect(classifyProviderError(error, 'token refresh')).toBe(error);
  });

  it('should treat a 4xx without an OAuth error code as a rejection', () => {
    const result = classifyProviderError(httpError(401, 'Unauthorized'), 'token refresh');

    expect(result).toBeInstanceOf(ProviderRejectedError);
    expect(result.message).toBe('Google rejected token refresh (401)');
  });

  it.each([408, 429])('should treat a %i as unavailability', (status) => {
    const result = classifyProviderError(httpError(status, { error: 'rate_limit_exceeded' }), 'token refresh');

    expect(result).toBeInstanceOf(ProviderUnavailableError);
    expect(result.message).toBe(`Google failed token refresh (${status})`);
  });

  it('should treat a 5xx as unavailability', () => {
    const result = classifyProviderError(httpError(500, { error: 'internal_failure' }), 'code exchange');

    expect(result).toBeInstanceOf(ProviderUnavailableError);
    expect(result.message).toBe('Google failed code exchange (500)');
  });

  it('should treat unknown values as unavailability', () => {
    expect(classifyProviderError('boom', 'token refresh').message).toBe(
      'Could not reach Google for token refresh: unknown error'
    );
  });
});
