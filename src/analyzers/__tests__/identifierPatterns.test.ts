import { describe, it, expect } from 'vitest';
import {
  buildApplication, hasDataStreamMarker, isDottedDate, isNumeric, isVersion,
  normalizeDate, splitOnLastHyphen, stripDataStreamMarker,
} from '../identifierPatterns';

describe('identifierPatterns', () => {
  it('finds the data stream marker anywhere in the name', () => {
    expect(hasDataStreamMarker('.ds-logs')).toBe(true);
    expect(hasDataStreamMarker('restored.ds-logs')).toBe(true);
    expect(hasDataStreamMarker('logs-ds-web')).toBe(false);
    expect(hasDataStreamMarker('')).toBe(false);
  });

  it('matches dotted dates and versions at the start of a token', () => {
    expect(isDottedDate('2024.01.15')).toBe(true);
    expect(isDottedDate('2024-01-15')).toBe(false);
    expect(isDottedDate('2024.1.15')).toBe(false);
    expect(isVersion('7.10.2')).toBe(true);
    expect(isVersion('7.10')).toBe(false);
  });

  it('accepts digits only as numeric', () => {
    expect(isNumeric('000003')).toBe(true);
    expect(isNumeric('3a')).toBe(false);
    expect(isNumeric('')).toBe(false);
  });

  it('normalizes dotted dates to dashes', () => {
    expect(normalizeDate('2024.01.15')).toBe('2024-01-15');
  });

  describe('stripDataStreamMarker', () => {
    it('drops the whole leading run of marker characters in character-class mode', () => {
      expect(stripDataStreamMarker('.ds-logs-x', 'character-class')).toBe('logs-x');
      expect(stripDataStreamMarker('.ds-sdk-x', 'character-class')).toBe('k-x');
      expect(stripDataStreamMarker('.ds-', 'character-class')).toBe('');
    });

    it('removes the prefix once in literal-prefix mode', () => {
      expect(stripDataStreamMarker('.ds-sdk-x', 'literal-prefix')).toBe('sdk-x');
      expect(stripDataStreamMarker('logs-x', 'literal-prefix')).toBe('logs-x');
    });
  });

  it('splits on the last hyphen only', () => {
    expect(splitOnLastHyphen('a-b-prod')).toEqual(['a-b', 'prod']);
    expect(splitOnLastHyphen('plain')).toBeNull();
  });

  it('appends the namespace to the dataset when present', () => {
    expect(buildApplication('nginx', 'access')).toBe('nginx.access');
    expect(buildApplication('nginx', null)).toBe('nginx');
  });
});
