import { describe, it, expect } from 'vitest';
import { deepFreeze } from '../../src/utils/freeze.js';

describe('deepFreeze', () => {
  it('freezes nested objects and arrays', () => {
    const record = deepFreeze({
      recordId: 'rec-1',
      responsibleParty: { firstName: 'Dana' },
      externalIds: { caseId: 'crm-1' },
      tags: ['a'],
    });

    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.responsibleParty)).toBe(true);
    expect(Object.isFrozen(record.externalIds)).toBe(true);
    expect(Object.isFrozen(record.tags)).toBe(true);
    expect(Reflect.set(record.responsibleParty, 'firstName', 'Other')).toBe(false);
    expect(record.responsibleParty.firstName).toBe('Dana');
  });

  it('returns the same object', () => {
    const value = { a: 1 };
    expect(deepFreeze(value)).toBe(value);
  });
});
