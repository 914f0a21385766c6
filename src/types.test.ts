import { describe, it, expect } from 'vitest';
import {
  TrialResult,
  taskConfigSchema,
  trialConfigSchema,
  prInfoSchema,
} from './types.js';
import { makePrInfo, makeTrialConfig } from './testing/fixtures.js';

describe('taskConfigSchema', () => {
  it('applies defaults', () => {
    const task = taskConfigSchema.parse({ taskId: 'pr-7', prUrl: 'https://github.com/o/r/pull/7' });

    expect(task).toEqual({
      taskId: 'pr-7',
      prUrl: 'https://github.com/o/r/pull/7',
      projectType: 'java-gradle',
      timeoutSec: 1800,
      cpus: 2,
      memoryMb: 4096,
      allowInternet: true,
      customVerifyScript: null,
      priority: 'medium',
    });
  });

  it('rejects unknown priorities', () => {
    expect(() => taskConfigSchema.parse({ taskId: 't', prUrl: 'u', priority: 'urgent' })).toThrow();
  });
});

describe('prInfoSchema', () => {
  it('rejects abbreviated commit SHAs', () => {
    expect(() => prInfoSchema.parse(makePrInfo({ targetCommit: 'abc1234' }))).toThrow();
  });
});

describe('buildTrialConfig', () => {
  it('copies sandbox and verifier settings from the task', () => {
    const config = makeTrialConfig(
      { cpus: 4, memoryMb: 8192, allowInternet: false, timeoutSec: 900, projectType: 'java-maven' },
      { trialId: '123e4567-e89b-42d3-a456-426614174000' }
    );

    expect(config.trialName).toBe('pr-42__trial-123e4567');
    expect(config.environment).toEqual({
      kind: 'docker',
      image: 'pr-verifier/java-gradle:latest',
      cpus: 4,
      memoryMb: 8192,
      allowInternet: false,
      workingDir: '/workspace',
    });
    expect(config.verifier).toEqual({ timeoutSec: 900, projectType: 'java-maven', customScript: null });
    expect(config.outputDir).toBe('results');
    expect(config.retryAttempts).toBe(2);
  });

  it('round-trips through JSON', () => {
    const config = makeTrialConfig({}, { outputDir: '/tmp/out', retryAttempts: 0 });
    const parsed = trialConfigSchema.parse(JSON.parse(JSON.stringify(config)));
    expect(parsed).toEqual(config);
  });
});

describe('TrialResult', () => {
  const base = {
    trialId: 't-1',
    trialName: 'pr-42__trial-t-1',
    taskId: 'pr-42',
    prUrl: 'https://github.com/acme/widgets/pull/42',
    prNumber: 42,
    trialDir: 'results/t-1',
  };

  it('has no duration until both timestamps are set', () => {
    const result = new TrialResult({ ...base, startedAt: new Date('2024-05-01T10:00:00.000Z') });
    expect(result.durationSec).toBeNull();

    result.finishedAt = new Date('2024-05-01T10:01:30.500Z');
    expect(result.durationSec).toBe(90.5);
  });

  it('succeeds only with a passing verification and no exception', () => {
    const verification = {
      success: true,
      compilationOutput: 'BUILD SUCCESSFUL\n',
      durationSec: 12,
      errorMessage: null,
      tasksRun: ['clean', 'build'],
    };

    expect(new TrialResult(base).success).toBe(false);
    expect(new TrialResult({ ...base, verificationResult: verification }).success).toBe(true);
    expect(
      new TrialResult({
        ...base,
        verificationResult: verification,
        exceptionInfo: { exceptionType: 'Error', exceptionMessage: 'x', traceback: 'x', kind: 'unexpected' },
      }).success
    ).toBe(false);
    expect(
      new TrialResult({ ...base, verificationResult: { ...verification, success: false } }).success
    ).toBe(false);
  });

  it('serializes dates as ISO strings with derived fields', () => {
    const result = new TrialResult({
      ...base,
      startedAt: new Date('2024-05-01T10:00:00.000Z'),
      finishedAt: new Date('2024-05-01T10:00:05.000Z'),
      attempts: 1,
    });

    expect(result.toJSON()).toMatchObject({
      startedAt: '2024-05-01T10:00:00.000Z',
      finishedAt: '2024-05-01T10:00:05.000Z',
      success: false,
      durationSec: 5,
    });
  });

  it('round-trips through JSON field for field', () => {
    const original = new TrialResult({
      ...base,
      verificationResult: {
        success: false,
        compilationOutput: 'error: cannot find symbol\n',
        durationSec: 3.25,
        errorMessage: 'Compilation failed - see output',
        tasksRun: ['clean', 'build'],
      },
      startedAt: new Date('2024-05-01T10:00:00.000Z'),
      finishedAt: new Date('2024-05-01T10:00:04.000Z'),
      attempts: 2,
    });

    const restored = TrialResult.fromJSON(JSON.parse(JSON.stringify(original)));

    expect(restored).toBeInstanceOf(TrialResult);
    expect(restored).toEqual(original);
    expect(restored.durationSec).toBe(4);
  });
});
