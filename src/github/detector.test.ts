import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { fakeGitHubFetch } from '../testing/fake-github.js';
import { createGitHubClient } from './client.js';
import { ProjectDetector, detectFromFiles } from './detector.js';

function file(name: string) {
  return { type: 'file', name, path: name };
}

function detector(routes: Record<string, unknown>) {
  const fake = fakeGitHubFetch(routes);
  return { detector: new ProjectDetector(createGitHubClient({ fetch: fake.fetch })), requests: fake.requests };
}

describe('detectFromFiles', () => {
  it('follows rule order', () => {
    expect(detectFromFiles(['README.md', 'pom.xml', 'build.gradle'])).toBe('java-gradle');
    expect(detectFromFiles(['package.json', 'yarn.lock'])).toBe('nodejs-yarn');
  });

  it('matches suffix indicators', () => {
    expect(detectFromFiles(['Widgets.sln', 'README.md'])).toBe('dotnet');
  });

  it('returns unknown when nothing matches', () => {
    expect(detectFromFiles(['README.md', 'LICENSE'])).toBe('unknown');
  });
});

describe('ProjectDetector', () => {
  let tmpDir: string | null = null;

  afterEach(async () => {
    if (tmpDir) {
      await fs.rm(tmpDir, { recursive: true, force: true });
      tmpDir = null;
    }
  });

  it('detects from root files on the branch', async () => {
    const { detector: d, requests } = detector({
      '/repos/acme/widgets/contents': [file('README.md'), file('Cargo.toml')],
    });

    expect(await d.detect('acme', 'widgets', 'develop')).toBe('rust-cargo');
    expect(requests).toHaveLength(1);
    expect(requests[0]).toMatch(/^\/repos\/acme\/widgets\/contents\/?\?ref=develop$/);
  });

  it('ignores directories named like indicators', async () => {
    const { detector: d } = detector({
      '/repos/acme/widgets/contents': [{ type: 'dir', name: 'go.mod', path: 'go.mod' }],
      '/repos/acme/widgets/languages': { Python: 5000, Shell: 200 },
    });

    expect(await d.detect('acme', 'widgets')).toBe('python-pip');
  });

  it('falls back to the primary language', async () => {
    const { detector: d } = detector({
      '/repos/acme/widgets/contents': [file('README.md')],
      '/repos/acme/widgets/languages': { Shell: 300, Kotlin: 90000, Java: 1200 },
    });

    expect(await d.detect('acme', 'widgets')).toBe('java-gradle');
  });

  it('returns unknown when the API is unavailable', async () => {
    const { detector: d } = detector({});

    expect(await d.detect('acme', 'widgets')).toBe('unknown');
  });

  it('detects a local checkout', async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'detector-test-'));
    await fs.writeFile(path.join(tmpDir, 'go.mod'), 'module example.com/widgets\n');
    await fs.mkdir(path.join(tmpDir, 'pom.xml'));

    expect(await new ProjectDetector(createGitHubClient()).detectLocal(tmpDir)).toBe('go-mod');
  });
});
