import { describe, expect, it } from 'vitest';
import { GHG_SCOPE1 } from '../testing/fakes';
import { buildSearchQuery, formatContext, NO_CONTEXT_MESSAGE } from './extraction-prompt';

describe('formatContext', () => {
  it('tags each chunk with page and chunk index and separates them', () => {
    const context = formatContext([
      { chunkId: 1, text: 'Scope 1: 1250 MT CO2e', pageNumber: 45, chunkIndex: 2, distance: 0.1 },
      { chunkId: 2, text: 'Scope 2: 800 MT CO2e', pageNumber: 46, chunkIndex: 0, distance: 0.2 },
    ]);

    expect(context).toBe(
      '[Page 45, Chunk 2]\nScope 1: 1250 MT CO2e\n\n---\n\n[Page 46, Chunk 0]\nScope 2: 800 MT CO2e'
    );
  });

  it('says so when there is no context', () => {
    expect(formatContext([])).toBe(NO_CONTEXT_MESSAGE);
  });
});

describe('buildSearchQuery', () => {
  it('leaves out a missing unit', () => {
    expect(buildSearchQuery({ ...GHG_SCOPE1, unit: null })).toBe(
      'Total Scope 1 emissions Direct GHG emissions from organization owned or controlled sources'
    );
  });
});
