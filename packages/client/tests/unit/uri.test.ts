import { describe, it, expect } from 'vitest';
import { FormatError } from '@predictkit/utils';
import { idForUri } from '../../src/resources/uri.js';

describe('idForUri', () => {
  it('should return the trailing integer id', () => {
    expect(idForUri('http://example.com/api/forecast/71/')).toBe(71);
    expect(idForUri('http://example.com/api/forecast/71')).toBe(71);
    expect(idForUri('http://example.com/api/project/0//')).toBe(0);
  });

  it('should reject URIs without a trailing id', () => {
    expect(() => idForUri('http://example.com/api/projects/')).toThrow(FormatError);
    expect(() => idForUri('')).toThrow("No trailing integer id in URI ''");
    expect(() => idForUri('http://example.com/api/forecast/7a/')).toThrow(
      "No trailing integer id in URI 'http://example.com/api/forecast/7a/'"
    );
  });
});
