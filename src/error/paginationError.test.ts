import { describe, expect, it } from 'vitest';
import { BatchPartError, getBatchPartError } from './batchPartError.js';
import { BindingError, isBindingError } from './bindingError.js';
import { ConfigurationError, isConfigurationError } from './configurationError.js';
import { getPaginationError, PaginationError } from './paginationError.js';

describe('PaginationError', () => {
  it('keeps the pages decoded before the failure', () => {
    const err = new PaginationError('stopped', [{ page: 1 }, { page: 2 }], { cause: new Error('boom') });

    expect(getPaginationError(err)?.pages).toEqual([{ page: 1 }, { page: 2 }]);
    expect(err.name).toBe('PaginationError');
  });
});

describe('call-level errors', () => {
  it('BindingError records descriptor and parameter', () => {
    const err = new BindingError('unresolved', 'items.get', 'itemId');

    expect(isBindingError(err)).toBe(true);
    expect(err.descriptor).toBe('items.get');
    expect(err.parameter).toBe('itemId');
  });

  it('BatchPartError records the index', () => {
    const err = new Error('outer', { cause: new BatchPartError('missing part', 3) });

    expect(getBatchPartError(err)?.index).toBe(3);
  });

  it('ConfigurationError is distinguishable', () => {
    expect(isConfigurationError(new ConfigurationError('mixed families'))).toBe(true);
    expect(isConfigurationError(new Error('mixed families'))).toBe(false);
  });
});
