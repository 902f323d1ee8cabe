import { describe, expect, it } from 'vitest';
import { CategoryIndex } from './categoryIndex.js';

describe('CategoryIndex', () => {
  const categories = () => {
    const index = new CategoryIndex([
      ['Forms', 'forms.html'],
      ['Inputs', 'forms.html']
    ]);
    index.set('Type', 'type.html');
    return index;
  };

  it('keeps insertion order', () => {
    expect([...categories()]).toEqual([
      ['Forms', 'forms.html'],
      ['Inputs', 'forms.html'],
      ['Type', 'type.html']
    ]);
    expect(categories().size).toBe(3);
  });

  it('finds the first label for a page', () => {
    expect(categories().labelFor('forms.html')).toBe('Forms');
    expect(categories().labelFor('none.html')).toBeUndefined();
    expect(categories().fileFor('Type')).toBe('type.html');
  });

  it('lists integer-like labels where they were added', () => {
    const index = new CategoryIndex([
      ['Zeta', 'z.html'],
      ['2024', 'y.html'],
      ['10', 'x.html']
    ]);

    expect(index.toEntries()).toEqual([
      ['Zeta', 'z.html'],
      ['2024', 'y.html'],
      ['10', 'x.html']
    ]);
  });
});
