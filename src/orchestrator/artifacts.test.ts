import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { makeTrialConfig } from '../testing/fixtures.js';
import { readTrialConfig, trialDirFor, writeTrialConfig } from './artifacts.js';

describe('trial artifacts', () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'artifacts-test-'));
  });

  afterEach(async () => {
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  it('places each trial under its id', () => {
    const config = makeTrialConfig({}, { outputDir: 'out', trialId: '123e4567-e89b-42d3-a456-426614174000' });
    expect(trialDirFor(config)).toBe(path.join('out', '123e4567-e89b-42d3-a456-426614174000'));
  });

  it('leaves the output directory out of config.json and restores it on read', async () => {
    const config = makeTrialConfig({ customVerifyScript: './verify.sh' }, { outputDir });
    const trialDir = trialDirFor(config);
    await fs.mkdir(trialDir);

    await writeTrialConfig(trialDir, config);

    const raw: unknown = JSON.parse(await fs.readFile(path.join(trialDir, 'config.json'), 'utf-8'));
    expect(raw).not.toHaveProperty('outputDir');
    expect(await readTrialConfig(trialDir)).toEqual(config);
  });
});
