import jwt from 'jsonwebtoken';
import { describe, expect, test } from 'vitest';
import { InvalidTokenError } from '../src/errors.js';
import { TokenService } from '../src/tokens.js';
import { TEST_SECRET } from './helpers.js';

const START = Date.UTC(2026, 0, 1, 12, 0, 0);
const MINUTE = 60 * 1000;

function tamper(token: string): string {
  const [header, payload, signature] = token.split('.');
  const i = Math.floor(payload.length / 2);
  const swapped = payload[i] === 'A' ? 'B' : 'A';
  return [header, payload.slice(0, i) + swapped + payload.slice(i + 1), signature].join('.');
}

describe('TokenService', () => {
  test('round-trips the subject and role', () => {
    const tokens = new TokenService({ secret: TEST_SECRET });
    const token = tokens.issueToken(7, 'gm');

    expect(tokens.validateToken(token)).toEqual({ userId: 7, role: 'gm' });
  });

  test('embeds issued-at and expiry', () => {
    const tokens = new TokenService({ secret: TEST_SECRET, clock: () => START });
    const claims = jwt.decode(tokens.issueToken(3, 'player', 2));

    expect(claims).toEqual({ sub: '3', role: 'player', iat: START / 1000, exp: START / 1000 + 7200 });
  });

  test('is valid until it expires', () => {
    let now = START;
    const tokens = new TokenService({ secret: TEST_SECRET, clock: () => now });
    const token = tokens.issueToken(1, 'player', 1);

    now = START + 59 * MINUTE;
    expect(tokens.validateToken(token)).toEqual({ userId: 1, role: 'player' });

    now = START + 61 * MINUTE;
    expect(() => tokens.validateToken(token)).toThrow(InvalidTokenError);
    expect(() => tokens.validateToken(token)).toThrow('Authentication token has expired');
  });

  test('defaults to a 24 hour lifetime', () => {
    let now = START;
    const tokens = new TokenService({ secret: TEST_SECRET, clock: () => now });
    const token = tokens.issueToken(1, 'gm');

    now = START + 23 * 60 * MINUTE;
    expect(tokens.validateToken(token).userId).toBe(1);
    now = START + 25 * 60 * MINUTE;
    expect(() => tokens.validateToken(token)).toThrow(InvalidTokenError);
  });

  test('rejects a token with an altered byte', () => {
    const tokens = new TokenService({ secret: TEST_SECRET });
    const token = tokens.issueToken(1, 'player');

    expect(() => tokens.validateToken(tamper(token))).toThrow(InvalidTokenError);
  });

  test('rejects tokens signed with another key', () => {
    const ours = new TokenService({ secret: TEST_SECRET });
    const theirs = new TokenService({ secret: 'other-secret' });

    expect(() => ours.validateToken(theirs.issueToken(1, 'gm'))).toThrow('Invalid authentication token');
  });

  test('rejects malformed tokens and unexpected claims', () => {
    const tokens = new TokenService({ secret: TEST_SECRET });
    const iat = Math.floor(Date.now() / 1000);
    const wrongRole = jwt.sign({ sub: '1', role: 'admin', iat, exp: iat + 60 }, TEST_SECRET);
    const noSubject = jwt.sign({ role: 'gm', iat, exp: iat + 60 }, TEST_SECRET);

    expect(() => tokens.validateToken('not-a-token')).toThrow(InvalidTokenError);
    expect(() => tokens.validateToken(wrongRole)).toThrow(InvalidTokenError);
    expect(() => tokens.validateToken(noSubject)).toThrow(InvalidTokenError);
  });
});
