import { describe, expect, it } from 'vitest';
import { loadConfigFromArgs } from './config.js';

describe('loadConfigFromArgs', () => {
  it('defaults to cwd and the dailies directory', () => {
    expect(loadConfigFromArgs([], '/home/notes')).toEqual({
      rootDir: '/home/notes',
      dailiesDir: 'dailies',
    });
  });

  it('resolves --root against cwd', () => {
    expect(loadConfigFromArgs(['--root', 'org', '--dailies', 'journal'], '/home/notes')).toEqual({
      rootDir: '/home/notes/org',
      dailiesDir: 'journal',
    });
  });

  it('rejects missing values and unknown flags', () => {
    expect(() => loadConfigFromArgs(['--root'], '/home/notes')).toThrow('Missing value for --root');
    expect(() => loadConfigFromArgs(['--verbose', 'x'], '/home/notes')).toThrow(
      'Unknown argument: --verbose'
    );
  });
});
