import { describe, expect, it } from 'vitest';
import { SourceFile } from '../src/core/source.js';
import { CommandSuppressionFilter, parseCommand } from '../src/core/suppression.js';

describe('parseCommand', () => {
  it('reads action, scope and rule ids up to a trailing reason', () => {
    expect(parseCommand('// classfinal:disable:next rule_a rule_b - legacy API', 0, 3)).toEqual({
      action: 'disable',
      scope: 'next',
      ruleIds: ['rule_a', 'rule_b'],
      offset: 0,
      line: 3,
    });
  });

  it('strips the end of a block comment', () => {
    expect(parseCommand('/* classfinal:enable all */', 12, 1)).toEqual({
      action: 'enable',
      ruleIds: ['all'],
      offset: 12,
      line: 1,
    });
  });

  it('ignores comments that are not commands', () => {
    expect(parseCommand('// classfinal:disable', 0, 1)).toBeUndefined();
    expect(parseCommand('// classfinal:disabled rule_a', 0, 1)).toBeUndefined();
    expect(parseCommand('// a plain comment', 0, 1)).toBeUndefined();
  });
});

describe('CommandSuppressionFilter', () => {
  // lines start at offsets 0, 2 and 4
  const file = new SourceFile('x\ny\nz');

  it('disables a rule from the command offset on', () => {
    const filter = new CommandSuppressionFilter(file, [{ action: 'disable', ruleIds: ['r'], offset: 2, line: 2 }]);
    expect(filter.check({ location: 0, length: 1 }, 'r')).toBe('enabled');
    expect(filter.check({ location: 4, length: 1 }, 'r')).toBe('disabled');
    expect(filter.check({ location: 4, length: 1 }, 'other')).toBe('enabled');
  });

  it('applies line-scoped commands to their target line only', () => {
    const filter = new CommandSuppressionFilter(file, [
      { action: 'disable', scope: 'previous', ruleIds: ['r'], offset: 4, line: 3 },
    ]);
    expect(filter.check({ location: 2, length: 1 }, 'r')).toBe('disabled');
    expect(filter.check({ location: 4, length: 1 }, 'r')).toBe('enabled');
  });

  it('lets a line command re-enable a rule inside a disabled region', () => {
    const filter = new CommandSuppressionFilter(file, [
      { action: 'disable', ruleIds: ['all'], offset: 0, line: 1 },
      { action: 'enable', scope: 'this', ruleIds: ['r'], offset: 3, line: 2 },
    ]);
    expect(filter.check({ location: 2, length: 1 }, 'r')).toBe('enabled');
    expect(filter.check({ location: 4, length: 1 }, 'r')).toBe('disabled');
  });

  it('reports ranges it cannot place', () => {
    const filter = new CommandSuppressionFilter(file, []);
    expect(filter.check({ location: 10, length: 1 }, 'r')).toBe('unresolvable');
    expect(filter.check({ location: 4, length: 5 }, 'r')).toBe('unresolvable');
  });
});
