import { describe, it, expect } from 'vitest';
import { extractHostname } from '../../src/core/hostname-extractor.js';

describe('extractHostname', () => {
  it('should return the trimmed line after the marker', () => {
    expect(extractHostname(['lssea output', '  VIOS hostname:  ', '  vios-a1  ', 'SEA : ent5'])).toBe('vios-a1');
  });

  it('should return null when the marker is missing', () => {
    expect(extractHostname(['VIOS hostname: vios-a1', 'hostname:', 'vios-a1'])).toBeNull();
    expect(extractHostname([])).toBeNull();
  });

  it('should return null when the marker is the last line', () => {
    expect(extractHostname(['VIOS hostname:'])).toBeNull();
  });

  it('should honor only the first marker', () => {
    expect(extractHostname(['VIOS hostname:', '', 'VIOS hostname:', 'vios-b2'])).toBeNull();
    expect(extractHostname(['VIOS hostname:', 'vios-a1', 'VIOS hostname:', 'vios-b2'])).toBe('vios-a1');
  });
});
