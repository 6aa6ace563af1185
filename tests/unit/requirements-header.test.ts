import { describe, it, expect } from 'vitest';
import { renderHeader } from '../../src/core/requirements-header.js';

describe('renderHeader', () => {
  it('names the generator and the manifest', () => {
    const header = renderHeader({
      generatorPath: 'tools/pinning/src/index.ts',
      manifestPath: 'tools/pinning/pyproject.toml',
    });

    expect(header).toBe(
      '# This file was generated by tools/pinning/src/index.ts and can be updated using\n' +
        '# that script. Dependencies are resolved from tools/pinning/pyproject.toml.\n' +
        '#\n' +
        '# It is normally used as constraints to pip, however, it has the name\n' +
        '# requirements.txt so that is scanned by GitHub. See\n' +
        '# https://docs.github.com/en/github/visualizing-repository-data-with-graphs/about-the-dependency-graph#supported-package-ecosystems\n' +
        '# for more info.\n',
    );
  });

  it('only emits comment lines', () => {
    const lines = renderHeader({ generatorPath: 'a', manifestPath: 'b' })
      .trimEnd()
      .split('\n');
    for (const line of lines) {
      expect(line === '#' || line.startsWith('# ')).toBe(true);
    }
  });
});
