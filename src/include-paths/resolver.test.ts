import { describe, expect, it, vi, beforeEach, afterEach } from 'vitest';

import { getDefaultConfig, type Config } from '../config/index.js';
import { ToolchainProbeFailedError, type CompilerRunner, type RunResult } from '../probe/types.js';
import { Logger } from '../utils/logger.js';
import { dedupeDirectories, resolveIncludeDirectories } from './resolver.js';
import { normalize } from './normalizer.js';
import { DelimiterNotFoundError } from './types.js';

function searchList(...dirs: string[]): string {
  return [
    'Using built-in specs.',
    '#include "..." search starts here:',
    '#include <...> search starts here:',
    ...dirs.map((dir) => ` ${dir}`),
    'End of search list.',
    '',
  ].join('\n');
}

/**
 * Runner answering per `-x <language>` with canned output.
 */
function createLanguageRunner(outputs: Record<string, RunResult>): CompilerRunner & {
  languages: string[];
} {
  const languages: string[] = [];
  return {
    languages,
    run(_command, args): Promise<RunResult> {
      const language = args[args.indexOf('-x') + 1] ?? '';
      languages.push(language);
      const result = outputs[language];
      if (result === undefined) {
        return Promise.reject(new Error(`unexpected language ${language}`));
      }
      return Promise.resolve(result);
    },
  };
}

function ok(output: string): RunResult {
  return { exitCode: 0, output, timedOut: false };
}

function configWith(overrides: (config: Config) => void): Config {
  const config = getDefaultConfig();
  overrides(config);
  return config;
}

describe('resolveIncludeDirectories', () => {
  let writes: string[];
  const logger = new Logger({ component: 'IncludeResolver' });

  beforeEach(() => {
    writes = [];
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array): boolean => {
      writes.push(typeof chunk === 'string' ? chunk : new TextDecoder().decode(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should place compiler defaults before injected directories', async () => {
    const runner = createLanguageRunner({
      c: ok(searchList('/usr/lib/gcc/x86_64-linux-gnu/12/include', '/usr/include')),
      'c++': ok(searchList('/usr/include/c++/12', '/usr/include')),
    });

    const dirs = await resolveIncludeDirectories(
      {
        compilerPath: '/usr/bin/gcc',
        env: { CC_DEPENDENCY_PREFIXES: '/opt/zlib:/opt/png' },
      },
      { runner, logger }
    );

    expect(runner.languages).toEqual(['c', 'c++']);
    expect(dirs.map((d) => d.path)).toEqual([
      '/usr/lib/gcc/x86_64-linux-gnu/12/include',
      '/usr/include',
      '/usr/include/c++/12',
      '/opt/zlib/include',
      '/opt/png/include',
    ]);
  });

  it('should keep duplicates when dedupe is disabled', async () => {
    const runner = createLanguageRunner({
      c: ok(searchList('/usr/include')),
      'c++': ok(searchList('/usr/include')),
    });

    const dirs = await resolveIncludeDirectories(
      {
        compilerPath: 'gcc',
        config: configWith((c) => {
          c.output.dedupe = false;
        }),
        env: { CC_DEPENDENCY_PREFIXES: '/usr' },
      },
      { runner, logger }
    );

    expect(dirs.map((d) => d.path)).toEqual(['/usr/include', '/usr/include', '/usr/include']);
  });

  it('should drop injected directories already reported by the compiler', async () => {
    const runner = createLanguageRunner({ 'c++': ok(searchList('/usr/include')) });

    const dirs = await resolveIncludeDirectories(
      { compilerPath: 'g++', languages: ['c++'], env: { CC_DEPENDENCY_PREFIXES: '/usr:/opt/x' } },
      { runner, logger }
    );

    expect(dirs.map((d) => d.path)).toEqual(['/usr/include', '/opt/x/include']);
  });

  it('should apply the execution root to both defaults and injected directories', async () => {
    const runner = createLanguageRunner({
      'c++': ok(searchList('/work/root/external/toolchain/include', '/usr/include')),
    });

    const dirs = await resolveIncludeDirectories(
      {
        compilerPath: 'clang++',
        languages: ['c++'],
        config: configWith((c) => {
          c.paths.execution_root = '/work/root';
        }),
        env: { CC_DEPENDENCY_PREFIXES: '/work/root/external/dep' },
      },
      { runner, logger }
    );

    expect(dirs).toEqual([
      normalize('external/toolchain/include'),
      normalize('/usr/include'),
      normalize('external/dep/include'),
    ]);
  });

  it('should read the prefix list from the configured variable', async () => {
    const runner = createLanguageRunner({ c: ok(searchList('/usr/include')) });

    const dirs = await resolveIncludeDirectories(
      {
        compilerPath: 'cc',
        languages: ['c'],
        config: configWith((c) => {
          c.dependencies.prefix_env_var = 'MY_DEPS';
        }),
        env: { CC_DEPENDENCY_PREFIXES: '/ignored', MY_DEPS: '/opt/mine' },
      },
      { runner, logger }
    );

    expect(dirs.map((d) => d.path)).toEqual(['/usr/include', '/opt/mine/include']);
  });

  it('should return only compiler defaults when the variable is unset', async () => {
    const runner = createLanguageRunner({ c: ok(searchList('/usr/include')) });

    const dirs = await resolveIncludeDirectories(
      { compilerPath: 'cc', languages: ['c'], env: {} },
      { runner, logger }
    );

    expect(dirs).toEqual([{ path: '/usr/include', literal: '/usr/include' }]);
  });

  it('should pass configured and requested flags to every probe', async () => {
    const seen: (readonly string[])[] = [];
    const runner: CompilerRunner = {
      run(_command, args): Promise<RunResult> {
        seen.push(args);
        return Promise.resolve(ok(searchList('/usr/include')));
      },
    };

    await resolveIncludeDirectories(
      {
        compilerPath: 'cc',
        flags: ['-m32'],
        config: configWith((c) => {
          c.probe.flags = ['--sysroot=/opt/sysroot'];
        }),
        env: {},
      },
      { runner, logger }
    );

    expect(seen).toEqual([
      ['-E', '-x', 'c', '-', '-v', '--sysroot=/opt/sysroot', '-m32'],
      ['-E', '-x', 'c++', '-', '-v', '--sysroot=/opt/sysroot', '-m32'],
    ]);
  });

  it('should log a summary of the resolution', async () => {
    const runner = createLanguageRunner({ c: ok(searchList('/usr/include', '/usr/local/include')) });

    await resolveIncludeDirectories(
      { compilerPath: 'cc', languages: ['c'], env: { CC_DEPENDENCY_PREFIXES: '/opt/a' } },
      { runner, logger }
    );

    const entries = writes.map((line): unknown => JSON.parse(line));
    expect(entries).toEqual([
      expect.objectContaining({
        level: 'info',
        component: 'IncludeResolver',
        event: 'include_directories_resolved',
        data: {
          compiler: 'cc',
          languages: ['c'],
          compilerDefaults: 2,
          injected: 1,
          total: 3,
        },
      }),
    ]);
  });

  it('should fail when the output has no search list', async () => {
    const runner = createLanguageRunner({ c: ok('clang: warning: argument unused\n') });

    await expect(
      resolveIncludeDirectories({ compilerPath: 'cc', languages: ['c'], env: {} }, { runner, logger })
    ).rejects.toBeInstanceOf(DelimiterNotFoundError);
  });

  it('should stop at the first failing probe', async () => {
    const runner = createLanguageRunner({
      c: { exitCode: 1, output: 'cc: fatal error\n', timedOut: false },
      'c++': ok(searchList('/usr/include')),
    });

    await expect(
      resolveIncludeDirectories({ compilerPath: 'cc', env: {} }, { runner, logger })
    ).rejects.toBeInstanceOf(ToolchainProbeFailedError);
    expect(runner.languages).toEqual(['c']);
  });
});

describe('dedupeDirectories', () => {
  it('should keep the first occurrence of each path in order', () => {
    const dirs = ['/a', '/b', '/a', '/c', '/b'].map((p) => normalize(p));

    expect(dedupeDirectories(dirs).map((d) => d.path)).toEqual(['/a', '/b', '/c']);
  });

  it('should treat a trailing slash as the same directory', () => {
    const dirs = [normalize('/usr/include/'), normalize('/usr/include')];

    expect(dedupeDirectories(dirs)).toEqual([{ path: '/usr/include', literal: '/usr/include' }]);
  });
});
