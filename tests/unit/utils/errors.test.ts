import { describe, it, expect } from 'vitest';
import {
  AuthError,
  AuthErrors,
  errorMessage,
  isChallengeRequired,
  isRateLimitError,
  sanitizeError,
} from '../../../src/utils/errors.js';

describe('AuthErrors', () => {
  it('should list every missing credential and be non-retryable', () => {
    const error = AuthErrors.CREDENTIALS_MISSING(['FITNESS_IDENTITY', 'FITNESS_SECRET']);

    expect(error).toBeInstanceOf(AuthError);
    expect(error.code).toBe('CREDENTIALS_MISSING');
    expect(error.message).toBe('Missing credentials: FITNESS_IDENTITY, FITNESS_SECRET must be set');
    expect(error.retryable).toBe(false);
    expect(error.details).toEqual({ missing: ['FITNESS_IDENTITY', 'FITNESS_SECRET'] });
  });

  it('should tell the operator how long to wait when rate limited', () => {
    const error = AuthErrors.RATE_LIMITED(60, 'HTTP 429');

    expect(error.message).toBe(
      'Rate limited by upstream service - wait about 60 minutes before retrying'
    );
    expect(error.details).toEqual({ retryAfterMinutes: 60, cause: 'HTTP 429' });
    expect(error.retryable).toBe(false);
  });

  it('should mark login and transport failures as retryable', () => {
    expect(AuthErrors.LOGIN_FAILED('bad gateway').retryable).toBe(true);
    expect(AuthErrors.TRANSPORT_ERROR('ntfy', 'HTTP 500').message).toBe(
      'ntfy request failed: HTTP 500'
    );
  });

  it('should serialize with toJSON', () => {
    const json = AuthErrors.CONFIGURATION_ERROR('auth.tokenStorePath: Required').toJSON();

    expect(json).toEqual({
      name: 'AuthError',
      code: 'CONFIGURATION_ERROR',
      message: 'Configuration error: auth.tokenStorePath: Required',
      retryable: false,
      details: undefined,
    });
  });
});

describe('isRateLimitError', () => {
  it.each([
    ['HTTP 429 returned by login endpoint'],
    ['Too Many Requests'],
    ['rate limit exceeded'],
    ['Rate-limited, try later'],
  ])('should detect "%s"', (message) => {
    expect(isRateLimitError(new Error(message))).toBe(true);
  });

  it('should detect a 429 status property', () => {
    expect(isRateLimitError({ status: 429 })).toBe(true);
    expect(isRateLimitError({ statusCode: 429 })).toBe(true);
  });

  it('should detect a RATE_LIMITED AuthError', () => {
    expect(isRateLimitError(AuthErrors.RATE_LIMITED(30))).toBe(true);
  });

  it('should not match other failures', () => {
    expect(isRateLimitError(new Error('Invalid credentials'))).toBe(false);
    expect(isRateLimitError(new Error('code 4290 is not a status'))).toBe(false);
    expect(isRateLimitError(AuthErrors.LOGIN_FAILED('429'))).toBe(false);
    expect(isRateLimitError(undefined)).toBe(false);
  });
});

describe('isChallengeRequired', () => {
  it('should detect challenge markers in messages', () => {
    expect(isChallengeRequired(new Error('MFA required'))).toBe(true);
    expect(isChallengeRequired(new Error('Enter the verification code'))).toBe(true);
    expect(isChallengeRequired(new Error('two-factor authentication needed'))).toBe(true);
    expect(isChallengeRequired('2FA pending')).toBe(true);
  });

  it('should detect the MFA_CHALLENGE_REQUIRED AuthError', () => {
    expect(isChallengeRequired(AuthErrors.MFA_CHALLENGE_REQUIRED())).toBe(true);
  });

  it('should ignore other AuthErrors even when their text mentions MFA', () => {
    expect(isChallengeRequired(AuthErrors.MFA_UNAVAILABLE('MFA code required', []))).toBe(false);
  });

  it('should not match unrelated errors', () => {
    expect(isChallengeRequired(new Error('Invalid password'))).toBe(false);
  });
});

describe('sanitizeError', () => {
  it('should describe AuthErrors by code', () => {
    const sanitized = sanitizeError(AuthErrors.LOGIN_FAILED('timeout'));

    expect(sanitized.type).toBe('AuthError');
    expect(sanitized.code).toBe('LOGIN_FAILED');
    expect(sanitized.message).toBe('Login failed: timeout');
  });

  it('should hide non-Error values', () => {
    expect(sanitizeError(42)).toEqual({ type: 'Unknown', message: 'An unknown error occurred' });
  });
});

describe('errorMessage', () => {
  it('should return the message of an Error and stringify anything else', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});
