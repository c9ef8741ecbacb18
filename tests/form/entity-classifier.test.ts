import { describe, it, expect } from 'vitest';
import { classifyEntity, isNonProfit } from '../../src/form/entity-classifier.js';

describe('classifyEntity', () => {
  it('maps raw entity types to categories', () => {
    expect(classifyEntity('LLC').category).toBe('LLC');
    expect(classifyEntity('Limited Liability Company').category).toBe('LLC');
    expect(classifyEntity('Sole Proprietorship').category).toBe('SoleProprietor');
    expect(classifyEntity('General Partnership').category).toBe('Partnership');
    expect(classifyEntity('S-Corp').category).toBe('Corporation');
    expect(classifyEntity('Trusteeship').category).toBe('Trust');
  });

  it('falls back to Other for unknown types', () => {
    expect(classifyEntity('Cooperative')).toEqual({ category: 'Other', subType: 'Other', nonProfit: false });
  });

  it('returns the same result for the same inputs', () => {
    const first = classifyEntity('Corporation', 'a nonprofit food bank', undefined);
    const second = classifyEntity('Corporation', 'a nonprofit food bank', undefined);
    expect(second).toEqual(first);
  });

  it('takes the sub-type from the entity-type table first', () => {
    expect(classifyEntity('S Corporation').subType).toBe('S Corporation');
    expect(classifyEntity('Joint Venture').subType).toBe('Joint Venture');
  });

  it('flips an unpinned sub-type when the description is non-profit', () => {
    expect(classifyEntity('Corporation', 'Operates a not-for-profit clinic').subType).toBe('Non-Profit Corporation');
    expect(classifyEntity('Corporation', 'Sells widgets').subType).toBe('Corporation');
  });

  it('keeps a pinned sub-type regardless of the description', () => {
    expect(classifyEntity('S Corporation', 'charity shop').subType).toBe('S Corporation');
  });

  it('reads the trust type for trusts', () => {
    expect(classifyEntity('Trusteeship', undefined, 'Revocable')).toEqual({
      category: 'Trust',
      subType: 'Revocable Trust',
      nonProfit: false,
    });
    expect(classifyEntity('Trust', undefined, 'Irrevocable Trust').subType).toBe('Irrevocable Trust');
    expect(classifyEntity('Trust', undefined, 'Family').subType).toBe('Other Trust');
  });
});

describe('isNonProfit', () => {
  it('matches any keyword case-insensitively', () => {
    expect(isNonProfit('Registered 501(c)(3) organisation')).toBe(true);
    expect(isNonProfit('NONPROFIT')).toBe(true);
    expect(isNonProfit('retail')).toBe(false);
    expect(isNonProfit(undefined)).toBe(false);
  });
});
