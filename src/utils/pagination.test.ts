import { describe, expect, it } from 'vitest';
import { decodeCursor, encodeCursor, paginate } from './pagination.js';

const items = ['a', 'b', 'c', 'd', 'e'];

describe('paginate', () => {
  it('walks the list page by page', () => {
    const first = paginate(items, undefined, 2);
    expect(first).toEqual({ items: ['a', 'b'], offset: 0, nextCursor: encodeCursor(2) });

    const second = paginate(items, first.nextCursor, 2);
    expect(second.items).toEqual(['c', 'd']);

    const last = paginate(items, second.nextCursor, 2);
    expect(last).toEqual({ items: ['e'], offset: 4 });
  });

  it('omits the cursor when everything fits', () => {
    expect(paginate(items, undefined, 5)).toEqual({ items, offset: 0 });
  });
});

describe('decodeCursor', () => {
  it('restarts on unreadable cursors', () => {
    expect(decodeCursor('not a cursor')).toBe(0);
    expect(decodeCursor(Buffer.from('{"offset":-3}').toString('base64url'))).toBe(0);
    expect(decodeCursor(Buffer.from('{"offset":"7"}').toString('base64url'))).toBe(0);
  });

  it('reads what encodeCursor wrote', () => {
    expect(decodeCursor(encodeCursor(40))).toBe(40);
  });
});
