import { describe, it, expect } from 'vitest';
import { UnsupportedProjectTypeError } from '../errors.js';
import { FakeEnvironment } from '../testing/fake-environment.js';
import {
  BuildToolVerifier,
  COMPILATION_FAILED_MESSAGE,
  CustomScriptVerifier,
  createVerifier,
} from './verifier.js';

const GRADLE_BUILD = 'clean build -x test --no-daemon --stacktrace';

async function startedEnvironment(): Promise<FakeEnvironment> {
  const environment = new FakeEnvironment();
  await environment.start();
  return environment;
}

describe('BuildToolVerifier (java-gradle)', () => {
  it('1. uses the wrapper when present and passes on exit 0', async () => {
    const environment = await startedEnvironment();
    environment
      .on('test -f ./gradlew', { stdout: 'yes\n' })
      .on(GRADLE_BUILD, { stdout: 'BUILD SUCCESSFUL in 42s', stderr: '' });

    const result = await new BuildToolVerifier('java-gradle').verify(environment, 1800);

    expect(environment.commands.map((c) => c.command)).toEqual([
      `test -f ./gradlew && echo 'yes' || echo 'no'`,
      'chmod +x ./gradlew',
      `./gradlew ${GRADLE_BUILD}`,
    ]);
    expect(environment.commands[2].options.timeoutSec).toBe(1800);
    expect(result.success).toBe(true);
    expect(result.errorMessage).toBeNull();
    expect(result.tasksRun).toEqual(['clean', 'build']);
    expect(result.compilationOutput).toBe('BUILD SUCCESSFUL in 42s\n');
  });

  it('2. reports a compilation failure with the build output', async () => {
    const environment = await startedEnvironment();
    environment
      .on('test -f ./gradlew', { stdout: 'yes' })
      .on(GRADLE_BUILD, { exitCode: 1, stdout: '> Task :compileJava FAILED', stderr: 'compile error: ; expected' });

    const result = await new BuildToolVerifier('java-gradle').verify(environment, 1800);

    expect(result.success).toBe(false);
    expect(result.errorMessage).toBe(COMPILATION_FAILED_MESSAGE);
    expect(result.compilationOutput).toBe('> Task :compileJava FAILED\ncompile error: ; expected');
    expect(result.tasksRun).toEqual(['clean', 'build']);
  });

  it('3. falls back to the system tool without a wrapper', async () => {
    const environment = await startedEnvironment();
    environment.on('test -f ./gradlew', { stdout: 'no\n' });

    const result = await new BuildToolVerifier('java-gradle').verify(environment, 600);

    expect(environment.commands.map((c) => c.command)).toEqual([
      `test -f ./gradlew && echo 'yes' || echo 'no'`,
      `gradle ${GRADLE_BUILD}`,
    ]);
    expect(result.success).toBe(true);
  });

  it('4. fails without building when chmod fails', async () => {
    const environment = await startedEnvironment();
    environment
      .on('test -f ./gradlew', { stdout: 'yes' })
      .on('chmod', { exitCode: 1, stderr: 'chmod: Operation not permitted' });

    const result = await new BuildToolVerifier('java-gradle').verify(environment, 1800);

    expect(environment.commands).toHaveLength(2);
    expect(result).toMatchObject({
      success: false,
      compilationOutput: 'chmod: Operation not permitted',
      errorMessage: 'Failed to make ./gradlew executable',
      tasksRun: [],
    });
  });

  it('5. reports a build timeout', async () => {
    const environment = await startedEnvironment();
    environment
      .on('test -f', { stdout: 'no' })
      .on(GRADLE_BUILD, { exitCode: 124, timedOut: true, stderr: '\nCommand timed out after 5s' });

    const result = await new BuildToolVerifier('java-gradle').verify(environment, 5);

    expect(result.success).toBe(false);
    expect(result.errorMessage).toBe('Build timed out after 5s');
  });

  it('6. never throws when the environment does', async () => {
    const environment = new FakeEnvironment();

    const result = await new BuildToolVerifier('java-gradle').verify(environment, 1800);

    expect(result.success).toBe(false);
    expect(result.errorMessage).toBe(
      'Verification exception: Environment fake-env is not started. Call start() first.'
    );
    expect(result.tasksRun).toEqual([]);
  });
});

describe('BuildToolVerifier (no wrapper)', () => {
  it('7. runs the npm build without probing', async () => {
    const environment = await startedEnvironment();

    const result = await new BuildToolVerifier('nodejs-npm').verify(environment, 300);

    expect(environment.commands.map((c) => c.command)).toEqual(['npm ci && npm run build']);
    expect(result.tasksRun).toEqual(['install', 'build']);
  });
});

describe('CustomScriptVerifier', () => {
  it('8. uploads and runs the script', async () => {
    const environment = await startedEnvironment();
    environment.on('/tmp/verify/check.sh', (command) =>
      command.startsWith('chmod') ? {} : { stdout: 'ok' }
    );

    const result = await new CustomScriptVerifier('/home/dev/scripts/check.sh').verify(environment, 120);

    expect(environment.uploads).toEqual([
      { localPath: '/home/dev/scripts/check.sh', remotePath: '/tmp/verify/check.sh' },
    ]);
    expect(environment.commands.map((c) => c.command)).toEqual([
      'chmod +x /tmp/verify/check.sh',
      '/tmp/verify/check.sh',
    ]);
    expect(result).toMatchObject({ success: true, compilationOutput: 'ok\n', tasksRun: ['custom'] });
  });

  it('9. reports the script exit code', async () => {
    const environment = await startedEnvironment();
    environment.on(/^\/tmp\/verify/, { exitCode: 3 });

    const result = await new CustomScriptVerifier('verify.sh').verify(environment, 120);

    expect(result.errorMessage).toBe('Verify script exited with code 3');
  });
});

describe('createVerifier', () => {
  it('10. prefers a custom script', () => {
    const verifier = createVerifier({ timeoutSec: 60, projectType: 'java-gradle', customScript: 'v.sh' });
    expect(verifier.label).toBe('custom');
  });

  it('11. selects by project type', () => {
    expect(createVerifier({ timeoutSec: 60, projectType: 'go-mod', customScript: null }).label).toBe('go-mod');
  });

  it('12. rejects unknown project types', () => {
    expect(() => createVerifier({ timeoutSec: 60, projectType: 'unknown', customScript: null }))
      .toThrow(UnsupportedProjectTypeError);
  });
});
