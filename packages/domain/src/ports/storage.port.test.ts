import { describe, it, expect } from 'vitest';
import { normalizePrefix } from './storage.port.js';

describe('normalizePrefix', () => {
  it('should list the whole bucket for the root prefix', () => {
    expect(normalizePrefix('/')).toEqual({ prefix: undefined, startAfter: undefined });
    expect(normalizePrefix()).toEqual({ prefix: undefined, startAfter: undefined });
  });

  it('should strip a leading slash', () => {
    expect(normalizePrefix('/calls/2024')).toEqual({ prefix: 'calls/2024', startAfter: undefined });
  });

  it('should skip the directory placeholder of a directory prefix', () => {
    expect(normalizePrefix('/calls/')).toEqual({ prefix: 'calls/', startAfter: 'calls/' });
    expect(normalizePrefix('calls/')).toEqual({ prefix: 'calls/', startAfter: 'calls/' });
  });
});
