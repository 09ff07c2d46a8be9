import jwt from 'jsonwebtoken';
import { describe, expect, it } from 'vitest';

import { TokenCodec, type TokenClaims } from '../src/lib/token-codec';
import { ManualClock, TEST_SECRET } from './helpers';

const ISSUER = 'milk-ledger-test';

function claimsAt(clock: ManualClock, overrides: Partial<TokenClaims> = {}): TokenClaims {
  const iat = Math.floor(clock.now().getTime() / 1000);
  return {
    sub: '7',
    type: 'access',
    iat,
    exp: iat + 60,
    jti: 'nonce-1',
    ...overrides,
  };
}

describe('TokenCodec', () => {
  it('decodes the claims it encoded', () => {
    const clock = new ManualClock();
    const codec = new TokenCodec({ secret: TEST_SECRET, issuer: ISSUER, clock });
    const claims = claimsAt(clock);

    const result = codec.decode(codec.encode(claims));

    expect(result).toEqual({ ok: true, claims });
  });

  it('reports a signature mismatch for tokens signed with another key', () => {
    const clock = new ManualClock();
    const signer = new TokenCodec({ secret: 'other-secret-other-secret-other-secret', issuer: ISSUER, clock });
    const codec = new TokenCodec({ secret: TEST_SECRET, issuer: ISSUER, clock });

    const result = codec.decode(signer.encode(claimsAt(clock)));

    expect(result).toMatchObject({ ok: false, reason: 'SignatureInvalid' });
  });

  it('accepts a token until the second it expires', () => {
    const clock = new ManualClock();
    const codec = new TokenCodec({ secret: TEST_SECRET, issuer: ISSUER, clock });
    const token = codec.encode(claimsAt(clock));

    clock.advanceSeconds(59);
    expect(codec.decode(token).ok).toBe(true);

    clock.advanceSeconds(1);
    expect(codec.decode(token)).toMatchObject({ ok: false, reason: 'Expired' });
  });

  it('treats garbage as malformed', () => {
    const codec = new TokenCodec({ secret: TEST_SECRET, issuer: ISSUER });

    expect(codec.decode('not-a-token')).toMatchObject({ ok: false, reason: 'Malformed' });
  });

  it('rejects tokens from another issuer', () => {
    const clock = new ManualClock();
    const foreign = new TokenCodec({ secret: TEST_SECRET, issuer: 'someone-else', clock });
    const codec = new TokenCodec({ secret: TEST_SECRET, issuer: ISSUER, clock });

    expect(codec.decode(foreign.encode(claimsAt(clock)))).toMatchObject({
      ok: false,
      reason: 'Malformed',
    });
  });

  it('rejects correctly signed tokens whose claims are incomplete', () => {
    const clock = new ManualClock();
    const codec = new TokenCodec({ secret: TEST_SECRET, issuer: ISSUER, clock });
    const { jti, ...withoutNonce } = claimsAt(clock);
    const token = jwt.sign(withoutNonce, TEST_SECRET, { algorithm: 'HS256', issuer: ISSUER });

    expect(jti).toBe('nonce-1');
    expect(codec.decode(token)).toMatchObject({ ok: false, reason: 'Malformed' });
  });

  it('rejects unknown token kinds', () => {
    const clock = new ManualClock();
    const codec = new TokenCodec({ secret: TEST_SECRET, issuer: ISSUER, clock });
    const token = jwt.sign({ ...claimsAt(clock), type: 'session' }, TEST_SECRET, {
      algorithm: 'HS256',
      issuer: ISSUER,
    });

    expect(codec.decode(token)).toMatchObject({ ok: false, reason: 'Malformed' });
  });
});
