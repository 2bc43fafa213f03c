import { describe, test, expect, afterEach } from '@jest/globals';
import { getPalette } from '../theme.js';

describe('cli palette', () => {
  afterEach(() => {
    delete process.env.CLI_THEME;
  });

  test('NO_COLOR leaves text plain', () => {
    // set by tests/setupTests.ts
    expect(process.env.NO_COLOR).toBe('1');
    const p = getPalette();
    expect(p.pocket.red(' 7 ')).toBe(' 7 ');
    expect(p.error('boom')).toBe('boom');
  });

  test('mono theme still paints every pocket colour', () => {
    process.env.CLI_THEME = 'mono';
    const p = getPalette();
    expect(Object.keys(p.pocket).sort()).toEqual(['black', 'green', 'red']);
  });
});
