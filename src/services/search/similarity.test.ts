import { describe, expect, it } from 'vitest';
import {
  BlendedScorer,
  TokenSortScorer,
  levenshtein,
  partialRatio,
  ratio,
  tokenSortRatio,
} from './similarity.js';

describe('levenshtein', () => {
  it('counts single-character edits', () => {
    expect(levenshtein('kitten', 'sitting')).toBe(3);
    expect(levenshtein('', 'abc')).toBe(3);
    expect(levenshtein('abc', 'abc')).toBe(0);
  });

  it('treats a transposition as two edits', () => {
    expect(levenshtein('shape', 'shpae')).toBe(2);
  });
});

describe('ratio', () => {
  it('is 100 for identical strings and for two empty strings', () => {
    expect(ratio('queen', 'queen')).toBe(100);
    expect(ratio('', '')).toBe(100);
  });

  it('scales edit distance by the longer length', () => {
    expect(ratio('quen', 'queen')).toBe(80);
  });
});

describe('tokenSortRatio', () => {
  it('ignores word order', () => {
    expect(tokenSortRatio('you shape of', 'shape of you')).toBe(100);
  });
});

describe('partialRatio', () => {
  it('is 100 when the shorter string is contained', () => {
    expect(partialRatio('sheeran', 'ed sheeran perfect')).toBe(100);
  });

  it('takes the best same-length window', () => {
    // no six-character window is closer than three edits
    expect(partialRatio('sheren', 'ed sheeran')).toBe(50);
  });
});

describe('scorers', () => {
  it('TokenSortScorer matches tokenSortRatio', () => {
    expect(new TokenSortScorer().score('of shape you', 'shape of you')).toBe(100);
  });

  it('BlendedScorer caps partial resemblance at 90', () => {
    const scorer = new BlendedScorer();
    expect(scorer.score('sheeran', 'ed sheeran perfect')).toBe(90);
    expect(scorer.score('shape of you', 'shape of you')).toBe(100);
  });
});
