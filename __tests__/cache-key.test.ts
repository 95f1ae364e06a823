import { describe, it, expect } from 'vitest';
import { buildCacheKey, normalizeBody, sha256Hex } from '../src/cache/key.js';
import { parseEnvelope } from '../src/routing/envelope.js';
import type { RoutingDecision } from '../src/types.js';

const base: RoutingDecision = {
  tenantId: 'default',
  backend: 'opensearch',
  llmSource: 'ollama',
  upstreamBase: 'http://os.local:9003',
};

function body(raw: string) {
  return parseEnvelope(raw).passthrough;
}

describe('cache keys', () => {
  it('has the documented shape', () => {
    const key = buildCacheKey('vector', base, body('{"query":"x"}'));
    expect(key).toMatch(/^edge:v1:vector:opensearch:[0-9a-f]{64}$/);
  });

  it('ignores key order and whitespace', () => {
    const a = buildCacheKey('hybrid', base, body('{"query":"x","top_k":5,"filters":{"a":1,"b":2}}'));
    const b = buildCacheKey('hybrid', base, body('{ "filters": { "b": 2, "a": 1 },\n  "top_k": 5, "query": "x" }'));
    expect(a).toBe(b);
  });

  it('never shares a key across backends', () => {
    const pg: RoutingDecision = { ...base, backend: 'postgres', upstreamBase: 'http://os.local:9003' };
    const b = body('{"query":"x","top_k":5}');
    expect(buildCacheKey('vector', base, b)).not.toBe(buildCacheKey('vector', pg, b));
  });

  it('separates endpoints and tenants', () => {
    const b = body('{"query":"x"}');
    expect(buildCacheKey('vector', base, b)).not.toBe(buildCacheKey('fts', base, b));
    expect(buildCacheKey('vector', base, b)).not.toBe(buildCacheKey('vector', { ...base, tenantId: 'other' }, b));
  });

  it('separates credential overrides', () => {
    const b = body('{"query":"x"}');
    const alice: RoutingDecision = { ...base, credentials: { username: 'alice', password: 'test-secret' } };
    expect(buildCacheKey('vector', base, b)).not.toBe(buildCacheKey('vector', alice, b));
  });

  it('separates overrides that differ only in password', () => {
    const b = body('{"query":"x"}');
    const right: RoutingDecision = { ...base, credentials: { username: 'alice', password: 'test-secret' } };
    const wrong: RoutingDecision = { ...base, credentials: { username: 'alice', password: 'wrong-secret' } };
    expect(buildCacheKey('vector', right, b)).not.toBe(buildCacheKey('vector', wrong, b));
    expect(buildCacheKey('vector', right, b)).toBe(
      buildCacheKey('vector', { ...base, credentials: { username: 'alice', password: 'test-secret' } }, b),
    );
  });

  it('does not conflate a colon in the username with the password', () => {
    const b = body('{"query":"x"}');
    const one: RoutingDecision = { ...base, credentials: { username: 'a:b', password: 'c' } };
    const two: RoutingDecision = { ...base, credentials: { username: 'a', password: 'b:c' } };
    expect(buildCacheKey('vector', one, b)).not.toBe(buildCacheKey('vector', two, b));
  });

  it('keeps integers beyond 2^53 distinct', () => {
    const a = buildCacheKey('fts', base, body('{"query":"x","doc_id":9007199254740993}'));
    const b = buildCacheKey('fts', base, body('{"query":"x","doc_id":9007199254740992}'));
    expect(a).not.toBe(b);
  });

  it('keys generation endpoints on provider and model', () => {
    const b = body('{"message":"hi"}');
    const ollama = buildCacheKey('conversation', base, b);
    expect(buildCacheKey('conversation', { ...base, llmSource: 'bedrock' }, b)).not.toBe(ollama);
    expect(buildCacheKey('conversation', { ...base, model: 'm2' }, b)).not.toBe(ollama);
    expect(buildCacheKey('conversation', { ...base, region: 'eu-1' }, b)).not.toBe(ollama);
  });

  it('ignores the provider for search endpoints', () => {
    const b = body('{"query":"x"}');
    expect(buildCacheKey('fts', { ...base, llmSource: 'bedrock' }, b)).toBe(buildCacheKey('fts', base, b));
  });

  it('normalizes with sorted keys and no whitespace', () => {
    expect(normalizeBody(body('{ "b": 1, "a": [ 2, 1 ] }'))).toBe('{"a":[2,1],"b":1}');
    expect(normalizeBody(body('{"n":9007199254740993,"m":{"z":1.50,"y":null}}'))).toBe(
      '{"m":{"y":null,"z":1.50},"n":9007199254740993}',
    );
    expect(sha256Hex('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });
});
