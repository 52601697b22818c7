import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../utils/errors.js';
import { NamingRegistry } from './naming-registry.js';

const table = { generic: ['first', 'second'], curated: { hits: ['early_hits', 'late_hits'] } };

describe('NamingRegistry', () => {
  const registry = NamingRegistry.fromFile();

  it('loads the curated sequences', () => {
    expect(registry.isCurated('alerts')).toBe(true);
    expect(registry.namesFor('alerts').slice(0, 3)).toEqual(['initial_alerts', 'critical_alerts', 'warning_alerts']);
    expect(registry.namesFor('recommendations')).toHaveLength(9);
  });

  it('builds generic names for unknown identifiers', () => {
    expect(registry.strategyFor('scratch')).toEqual({
      identifier: 'scratch',
      curated: false,
      names: [
        'initial_scratch',
        'base_scratch',
        'processed_scratch',
        'enhanced_scratch',
        'updated_scratch',
        'modified_scratch',
        'final_scratch',
      ],
    });
  });

  it('picks names in order, skipping taken ones', () => {
    expect(registry.pick('scratch', 2)).toEqual(['initial_scratch', 'base_scratch']);
    expect(registry.pick('scratch', 2, new Set(['initial_scratch']))).toEqual(['base_scratch', 'processed_scratch']);
    expect(registry.pick('scratch', 0)).toEqual([]);
  });

  it('continues with numbered names once the sequence runs out', () => {
    const picked = registry.pick('scratch', 9);
    expect(picked.slice(7)).toEqual(['scratch_8', 'scratch_9']);
  });

  it('leaves excess slots empty in bounded mode', () => {
    const bounded = NamingRegistry.fromData(table, { unbounded: false });
    expect(bounded.isUnbounded()).toBe(false);
    expect(bounded.pick('v', 3)).toEqual(['first_v', 'second_v', null]);
    expect(bounded.pick('hits', 3)).toEqual(['early_hits', 'late_hits', null]);
  });

  it('rejects duplicate names', () => {
    expect(() => NamingRegistry.fromData({ generic: ['a', 'b'], curated: { x: ['y', 'y'] } })).toThrow(
      ConfigurationError
    );
  });

  it('rejects a sequence containing the identifier itself', () => {
    expect(() => NamingRegistry.fromData({ generic: ['a', 'b'], curated: { x: ['x', 'y'] } })).toThrow(
      /must differ from the identifier/
    );
  });

  it('rejects a missing file', () => {
    expect(() => NamingRegistry.fromFile('/nonexistent/naming.json')).toThrow(ConfigurationError);
  });
});
