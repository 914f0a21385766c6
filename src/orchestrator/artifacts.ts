import * as path from 'path';
import * as fs from 'fs/promises';
import writeFileAtomic from 'write-file-atomic';
import { TrialResult, trialConfigSchema, type TrialConfig } from '../types.js';

export const CONFIG_ARTIFACT = 'config.json';
export const RESULT_ARTIFACT = 'result.json';
export const COMPILATION_LOG_ARTIFACT = 'compilation.log';
export const EXCEPTION_ARTIFACT = 'exception.txt';

/** Directory holding one trial's artifacts: `<outputDir>/<trialId>` */
export function trialDirFor(config: TrialConfig): string {
  return path.join(config.outputDir, config.trialId);
}

/**
 * Persist the trial configuration. The output directory is left out: it is
 * the parent of the trial directory and restored from it on read.
 */
export async function writeTrialConfig(trialDir: string, config: TrialConfig): Promise<void> {
  const { outputDir: _outputDir, ...persisted } = config;
  await writeFileAtomic(
    path.join(trialDir, CONFIG_ARTIFACT),
    `${JSON.stringify(persisted, null, 2)}\n`,
    { encoding: 'utf-8' }
  );
}

export async function readTrialConfig(trialDir: string): Promise<TrialConfig> {
  const raw = await fs.readFile(path.join(trialDir, CONFIG_ARTIFACT), 'utf-8');
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null) {
    throw new Error(`Malformed ${CONFIG_ARTIFACT} in ${trialDir}`);
  }
  return trialConfigSchema.parse({ ...parsed, outputDir: path.dirname(trialDir) });
}

export async function writeTrialResult(trialDir: string, result: TrialResult): Promise<void> {
  await writeFileAtomic(
    path.join(trialDir, RESULT_ARTIFACT),
    `${JSON.stringify(result, null, 2)}\n`,
    { encoding: 'utf-8' }
  );
}

export async function readTrialResult(trialDir: string): Promise<TrialResult> {
  const raw = await fs.readFile(path.join(trialDir, RESULT_ARTIFACT), 'utf-8');
  return TrialResult.fromJSON(JSON.parse(raw));
}

export async function writeCompilationLog(trialDir: string, output: string): Promise<void> {
  await writeFileAtomic(path.join(trialDir, COMPILATION_LOG_ARTIFACT), output, { encoding: 'utf-8' });
}

export async function writeExceptionArtifact(trialDir: string, traceback: string): Promise<void> {
  await writeFileAtomic(path.join(trialDir, EXCEPTION_ARTIFACT), traceback, { encoding: 'utf-8' });
}
