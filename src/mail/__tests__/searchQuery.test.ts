/**
 * Tests for the inbox search query
 *
 * Usage: node --import tsx --test src/mail/__tests__/searchQuery.test.ts
 */

import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import { buildSearchQuery } from '../searchQuery.js';

const since = new Date(2025, 0, 3, 14, 30);

describe('buildSearchQuery', () => {
  it('combines sender, term and start date', () => {
    assert.equal(
      buildSearchQuery({ sender: 'alerts@example.com', term: 'GRN', since, limit: 10 }),
      'has:attachment from:"alerts@example.com" "GRN" after:2025/01/03'
    );
  });

  it('leaves out blank sender and term', () => {
    assert.equal(buildSearchQuery({ sender: '  ', since, limit: 10 }), 'has:attachment after:2025/01/03');
  });

  it('strips quotes from the term', () => {
    assert.equal(
      buildSearchQuery({ term: ' stock "daily" ', since, limit: 10 }),
      'has:attachment "stock daily" after:2025/01/03'
    );
  });
});
