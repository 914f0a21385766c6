import * as fs from 'fs/promises';
import { Octokit } from '@octokit/rest';
import pino from 'pino';
import { getErrorMessage } from '../errors.js';
import type { ProjectType } from '../types.js';

/**
 * Root-level files that identify an ecosystem, checked in order.
 * Entries starting with `*` match by suffix.
 */
export const DETECTION_RULES: ReadonlyArray<[ProjectType, readonly string[]]> = [
  ['java-gradle', ['build.gradle', 'build.gradle.kts', 'gradlew', 'settings.gradle', 'settings.gradle.kts']],
  ['java-maven', ['pom.xml']],
  ['nodejs-npm', ['package-lock.json']],
  ['nodejs-yarn', ['yarn.lock']],
  ['python-pip', ['requirements.txt', 'setup.py']],
  ['python-poetry', ['poetry.lock']],
  ['rust-cargo', ['Cargo.toml']],
  ['go-mod', ['go.mod']],
  ['dotnet', ['*.csproj', '*.sln']],
  ['ruby-bundler', ['Gemfile.lock']],
];

const LANGUAGE_MAP: Record<string, ProjectType> = {
  Java: 'java-gradle',
  Kotlin: 'java-gradle',
  JavaScript: 'nodejs-npm',
  TypeScript: 'nodejs-npm',
  Python: 'python-pip',
  Rust: 'rust-cargo',
  Go: 'go-mod',
  'C#': 'dotnet',
  Ruby: 'ruby-bundler',
};

function matchesIndicator(fileName: string, indicator: string): boolean {
  return indicator.startsWith('*')
    ? fileName.endsWith(indicator.slice(1))
    : fileName === indicator;
}

/**
 * Pick the project type whose indicator appears first in rule order.
 */
export function detectFromFiles(fileNames: readonly string[]): ProjectType {
  for (const [projectType, indicators] of DETECTION_RULES) {
    if (indicators.some((indicator) => fileNames.some((name) => matchesIndicator(name, indicator)))) {
      return projectType;
    }
  }
  return 'unknown';
}

/**
 * Project-type detection from repository contents, falling back to the
 * repository's primary language.
 */
export class ProjectDetector {
  private client: Octokit;
  private log: pino.Logger;

  constructor(client: Octokit, logger?: pino.Logger) {
    this.client = client;
    this.log = (logger ?? pino({ level: 'silent' })).child({ component: 'detector' });
  }

  async detect(owner: string, repo: string, branch = 'main'): Promise<ProjectType> {
    try {
      const { data } = await this.client.rest.repos.getContent({ owner, repo, path: '', ref: branch });
      if (Array.isArray(data)) {
        const fileNames = data.filter((entry) => entry.type === 'file').map((entry) => entry.name);
        const detected = detectFromFiles(fileNames);
        if (detected !== 'unknown') {
          return detected;
        }
      }
    } catch (error) {
      this.log.warn({ owner, repo, branch, err: getErrorMessage(error) }, 'Could not list repository contents');
    }

    return this.detectFromLanguage(owner, repo);
  }

  async detectLocal(repoPath: string): Promise<ProjectType> {
    const entries = await fs.readdir(repoPath, { withFileTypes: true });
    return detectFromFiles(entries.filter((entry) => entry.isFile()).map((entry) => entry.name));
  }

  private async detectFromLanguage(owner: string, repo: string): Promise<ProjectType> {
    try {
      const { data } = await this.client.rest.repos.listLanguages({ owner, repo });
      const ranked = Object.entries(data).sort(([, a], [, b]) => b - a);
      if (ranked.length === 0) {
        return 'unknown';
      }
      return LANGUAGE_MAP[ranked[0][0]] ?? 'unknown';
    } catch (error) {
      this.log.warn({ owner, repo, err: getErrorMessage(error) }, 'Could not read repository languages');
      return 'unknown';
    }
  }
}
