import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { packageVersion } from '../../src/cli/version.js';

describe('packageVersion', () => {
  it('reads the version from package.json', () => {
    const pkg: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
    const expected = typeof pkg === 'object' && pkg !== null && 'version' in pkg ? pkg.version : undefined;
    expect(packageVersion()).toBe(expected);
  });
});
