import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { bearerToken, tokensMatch } from '../../src/api/middleware.js';

describe('HTTP auth helpers', () => {
  it('extracts a bearer token', () => {
    assert.equal(bearerToken('Bearer test-token'), 'test-token');
    assert.equal(bearerToken('Bearer  test-token '), 'test-token');
    assert.equal(bearerToken('Basic dGVzdA=='), '');
    assert.equal(bearerToken(undefined), '');
  });

  it('compares tokens and never matches an empty expected token', () => {
    assert.equal(tokensMatch('test-token', 'test-token'), true);
    assert.equal(tokensMatch('test-tokem', 'test-token'), false);
    assert.equal(tokensMatch('short', 'test-token'), false);
    assert.equal(tokensMatch('', ''), false);
  });
});
