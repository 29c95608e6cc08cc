import { describe, expect, it } from 'vitest';
import { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';

describe('ConstructURLError', () => {
  it('carries the partially filled path and the missing placeholders', () => {
    const err = new ConstructURLError('error constructing URL', 'database/{projectId}/read', ['projectId']);

    expect(err.name).toBe('ConstructURLError');
    expect(err.path).toBe('database/{projectId}/read');
    expect(err.missing).toEqual(['projectId']);
  });

  it('defaults to no missing placeholders', () => {
    expect(new ConstructURLError('error constructing URL', 'database/}').missing).toEqual([]);
  });

  it('is found behind a wrapping error', () => {
    const err = new ConstructURLError('error constructing URL', 'auth/{projectId}/login', ['projectId']);
    const wrapped = new Error('error sending request', { cause: err });

    expect(isConstructURLError(wrapped)).toBe(true);
    expect(getConstructURLError(wrapped)).toBe(err);
  });

  it('is not matched by other errors', () => {
    const wrapped = new Error('outer', { cause: new TypeError('inner') });

    expect(isConstructURLError(wrapped)).toBe(false);
    expect(getConstructURLError(wrapped)).toBeNull();
  });
});
