import { describe, expect, it } from 'vitest';
import { normalizeText } from './normalize.js';

describe('normalizeText', () => {
  it('lowercases and folds accents', () => {
    expect(normalizeText('Beyoncé')).toBe('beyonce');
    expect(normalizeText('Sigur Rós')).toBe('sigur ros');
  });

  it('turns separators and punctuation into single spaces', () => {
    expect(normalizeText('Ed_Sheeran - Shape.of.You')).toBe('ed sheeran shape of you');
    expect(normalizeText('  AC/DC  ')).toBe('ac dc');
  });

  it('drops apostrophes instead of splitting words', () => {
    expect(normalizeText("Don't Stop Me Now")).toBe('dont stop me now');
  });

  it('expands music shorthand', () => {
    expect(normalizeText('Song ft. Someone')).toBe('song featuring someone');
    expect(normalizeText('Song feat Someone')).toBe('song featuring someone');
    expect(normalizeText('Artist vs. Artist')).toBe('artist versus artist');
    expect(normalizeText('Live w/ Band')).toBe('live with band');
  });

  it('leaves words that only start with a shorthand alone', () => {
    expect(normalizeText('Feather')).toBe('feather');
    expect(normalizeText('Left')).toBe('left');
  });

  it('returns an empty string for punctuation only', () => {
    expect(normalizeText(' - _ . ')).toBe('');
  });
});
