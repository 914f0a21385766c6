import { describe, it, expect } from 'vitest';
import { WorkspaceError } from '../errors.js';
import { FakeEnvironment } from '../testing/fake-environment.js';
import { makePrInfo, TARGET_SHA } from '../testing/fixtures.js';
import { setupPrWorkspace, shellQuote } from './workspace.js';

async function startedEnvironment(): Promise<FakeEnvironment> {
  const environment = new FakeEnvironment();
  await environment.start();
  return environment;
}

describe('shellQuote', () => {
  it('leaves safe tokens alone', () => {
    expect(shellQuote('https://github.com/acme/widgets.git')).toBe('https://github.com/acme/widgets.git');
    expect(shellQuote('feature/faster-parse')).toBe('feature/faster-parse');
  });

  it('single-quotes anything else', () => {
    expect(shellQuote('release 1.0')).toBe(`'release 1.0'`);
    expect(shellQuote(`it's`)).toBe(`'it'\\''s'`);
  });
});

describe('setupPrWorkspace', () => {
  it('issues exactly five commands in order', async () => {
    const environment = await startedEnvironment();

    const result = await setupPrWorkspace(environment, makePrInfo());

    expect(environment.commands.map((c) => c.command)).toEqual([
      'git clone --depth=1 --branch main https://github.com/acme/widgets.git /workspace',
      `git fetch --depth=50 origin ${TARGET_SHA} && git fetch origin pull/42/head:pr-source`,
      `git checkout ${TARGET_SHA}`,
      'git checkout -b mock-merge',
      'git merge pr-source --no-commit --no-edit',
    ]);
    expect(environment.commands[0].options.workingDir).toBe('/');
    expect(environment.commands[1].options.workingDir).toBeUndefined();
    expect(result).toEqual({ mergeClean: true, mergeOutput: '' });
  });

  it('honours a custom fetch depth', async () => {
    const environment = await startedEnvironment();

    await setupPrWorkspace(environment, makePrInfo(), { fetchDepth: 200 });

    expect(environment.commands[1].command).toContain('git fetch --depth=200 origin');
  });

  it('treats a merge conflict as non-fatal', async () => {
    const environment = await startedEnvironment();
    environment.on('git merge', {
      exitCode: 1,
      stdout: 'CONFLICT (content): Merge conflict in src/App.java\n',
      stderr: 'Automatic merge failed\n',
    });

    const result = await setupPrWorkspace(environment, makePrInfo());

    expect(result.mergeClean).toBe(false);
    expect(result.mergeOutput).toBe(
      'CONFLICT (content): Merge conflict in src/App.java\nAutomatic merge failed\n'
    );
    expect(environment.commands).toHaveLength(5);
  });

  it('stops after a failed clone', async () => {
    const environment = await startedEnvironment();
    environment.on('git clone', { exitCode: 128, stderr: 'fatal: repository not found\n' });

    const error = await setupPrWorkspace(environment, makePrInfo()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(WorkspaceError);
    expect(error).toMatchObject({
      step: 'clone',
      message: 'Failed to clone repository: fatal: repository not found',
    });
    expect(environment.commands).toHaveLength(1);
  });

  it('names the failing step for fetch, checkout and branch', async () => {
    const cases: Array<[string, string, string]> = [
      ['git fetch', 'fetch', 'Failed to fetch PR: boom'],
      [`git checkout ${TARGET_SHA}`, 'checkout', 'Failed to checkout target commit: boom'],
      ['checkout -b', 'branch', 'Failed to create merge branch: boom'],
    ];

    for (const [match, step, message] of cases) {
      const environment = await startedEnvironment();
      environment.on(match, { exitCode: 1, stderr: 'boom' });

      await expect(setupPrWorkspace(environment, makePrInfo())).rejects.toMatchObject({ step, message });
    }
  });
});
