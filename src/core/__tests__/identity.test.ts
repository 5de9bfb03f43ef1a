import test from 'node:test';
import assert from 'node:assert/strict';
import { hasDisplayName, normalizeName, normalizeUrl, sameIdentity } from '../identity';

test('names are trimmed, whitespace collapsed and lower-cased', () => {
  assert.equal(normalizeName('  Clínica   Botox\tMadrid '), 'clínica botox madrid');
});

test('urls are only trimmed', () => {
  assert.equal(normalizeUrl(' https://Example.com/A '), 'https://Example.com/A');
  assert.equal(normalizeUrl(undefined), '');
  assert.equal(normalizeUrl(null), '');
});

test('either identity key is enough to match', () => {
  assert.equal(sameIdentity({ displayName: 'Derma Studio' }, { displayName: 'derma  studio' }), true);
  assert.equal(
    sameIdentity(
      { displayName: 'Derma Studio', canonicalUrl: 'https://derma.example' },
      { displayName: 'Derma Studio Madrid', canonicalUrl: 'https://derma.example' },
    ),
    true,
  );
  assert.equal(sameIdentity({ displayName: 'A', canonicalUrl: '' }, { displayName: 'B', canonicalUrl: '' }), false);
  assert.equal(sameIdentity({ displayName: 'A' }, { displayName: 'B', canonicalUrl: 'https://b.example' }), false);
});

test('blank names are not usable identities', () => {
  assert.equal(hasDisplayName({ displayName: '   ' }), false);
  assert.equal(hasDisplayName({ displayName: null }), false);
  assert.equal(hasDisplayName({ displayName: 'Luma' }), true);
});
