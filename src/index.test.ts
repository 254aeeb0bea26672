import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  VERSION,
  getDefaultConfig,
  resolveIncludeDirectories,
  unescapeLiteral,
  type CompilerRunner,
} from './index.js';

describe('cc-include-dirs', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('VERSION', () => {
    it('should match package version', () => {
      expect(VERSION).toBe('0.1.0');
    });
  });

  it('should resolve literals that read back to the resolved paths', async () => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const runner: CompilerRunner = {
      run: () =>
        Promise.resolve({
          exitCode: 0,
          output: [
            'clang version 17.0.6',
            '#include <...> search starts here:',
            ' /work/root/external/llvm/include',
            ' /opt/odd "dir"',
            ' /System/Library/Frameworks (framework directory)',
            'End of search list.',
          ].join('\n'),
          timedOut: false,
        }),
    };
    const config = getDefaultConfig();
    config.probe.languages = ['c++'];
    config.paths.execution_root = '/work/root';

    const dirs = await resolveIncludeDirectories(
      { compilerPath: 'clang++', config, env: { CC_DEPENDENCY_PREFIXES: '/opt/100%' } },
      { runner }
    );

    expect(dirs.map((d) => d.literal)).toEqual([
      'external/llvm/include',
      '/opt/odd \\"dir\\"',
      '/System/Library/Frameworks',
      '/opt/100%%/include',
    ]);
    expect(dirs.map((d) => unescapeLiteral(d.literal))).toEqual(dirs.map((d) => d.path));
  });
});
