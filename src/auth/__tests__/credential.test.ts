import { describe, it, expect } from 'vitest';
import { epochSeconds, isCredentialValid, stampCredential } from '../credential.js';
import type { Credential } from '../types.js';

const at = (ms: number) => () => ms;

describe('stampCredential', () => {
  it('sets expires_at to acquisition time plus expires_in, in whole seconds', () => {
    const credential = stampCredential(
      { access_token: 'access-1', token_type: 'Bearer', expires_in: 3600, refresh_token: 'refresh-1' },
      at(1_700_000_000_900),
    );

    expect(credential).toEqual({
      access_token: 'access-1',
      token_type: 'Bearer',
      expires_in: 3600,
      refresh_token: 'refresh-1',
      expires_at: 1_700_003_600,
    });
  });
});

describe('isCredentialValid', () => {
  const credential: Credential = {
    access_token: 'access-1',
    token_type: 'Bearer',
    expires_in: 3600,
    expires_at: 1_700_003_600,
  };

  it('is valid strictly before expires_at', () => {
    expect(isCredentialValid(credential, at(1_700_003_599_999))).toBe(true);
  });

  it('is expired at expires_at exactly', () => {
    expect(isCredentialValid(credential, at(1_700_003_600_000))).toBe(false);
  });

  it('treats a credential without expires_at as expired', () => {
    const unstamped: Credential = { access_token: 'access-1', token_type: 'Bearer', expires_in: 3600 };
    expect(isCredentialValid(unstamped, at(0))).toBe(false);
  });
});

describe('epochSeconds', () => {
  it('floors milliseconds', () => {
    expect(epochSeconds(at(1999))).toBe(1);
  });
});
