import { describe, it, expect } from 'vitest';
import { PROMPT_CATALOG, catalogSchema } from './catalog';

const weightOf = (category: string) => PROMPT_CATALOG.find((p) => p.category === category)?.weight;

describe('PROMPT_CATALOG', () => {
  it('loads every category from the catalog file', () => {
    expect(PROMPT_CATALOG).toHaveLength(19);
    const names = PROMPT_CATALOG.map((p) => p.category);
    expect(names).toContain('paranoid_prophecy');
    expect(names).toContain('haunted_shopping_list');
  });

  it('applies weights, defaulting to 1', () => {
    expect(weightOf('actual_receipt')).toBe(2);
    expect(weightOf('haunted_shopping_list')).toBe(1.5);
    expect(weightOf('ascii_art')).toBe(1);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(PROMPT_CATALOG)).toBe(true);
    expect(Object.isFrozen(PROMPT_CATALOG[0])).toBe(true);
  });
});

describe('catalogSchema', () => {
  it('rejects duplicate categories', () => {
    const result = catalogSchema.safeParse([
      { category: 'warnings', text: 'one' },
      { category: 'warnings', text: 'two' },
    ]);
    expect(result.success).toBe(false);
  });

  it('rejects blank prompt text', () => {
    expect(catalogSchema.safeParse([{ category: 'warnings', text: '   ' }]).success).toBe(false);
  });

  it('rejects non-positive weights', () => {
    expect(catalogSchema.safeParse([{ category: 'warnings', text: 'x', weight: 0 }]).success).toBe(false);
  });

  it('rejects an empty catalog', () => {
    expect(catalogSchema.safeParse([]).success).toBe(false);
  });
});
