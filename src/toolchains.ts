import type { ProjectType } from './types.js';

export type SupportedProjectType = Exclude<ProjectType, 'unknown'>;

/**
 * How one build ecosystem is provisioned and verified.
 *
 * `wrapper` is a script bundled in the repository (e.g. ./gradlew) that is
 * preferred over the system-installed `tool` when present.
 */
export interface Toolchain {
  baseImage: string;
  setup: string;
  wrapper?: string;
  tool: string;
  buildCommand: (tool: string) => string;
  testCommand: (tool: string) => string;
  tasks: string[];
}

const APT_GIT = 'apt-get update && apt-get install -y --no-install-recommends git ca-certificates bash';
const APK_GIT = 'apk add --no-cache git bash';

export const TOOLCHAINS: Record<SupportedProjectType, Toolchain> = {
  'java-gradle': {
    baseImage: 'eclipse-temurin:17-jdk-jammy',
    setup: `${APT_GIT} curl`,
    wrapper: './gradlew',
    tool: 'gradle',
    buildCommand: (tool) => `${tool} clean build -x test --no-daemon --stacktrace`,
    testCommand: (tool) => `${tool} test --no-daemon`,
    tasks: ['clean', 'build'],
  },
  'java-maven': {
    baseImage: 'maven:3.9-eclipse-temurin-17',
    setup: APT_GIT,
    wrapper: './mvnw',
    tool: 'mvn',
    buildCommand: (tool) => `${tool} clean compile -DskipTests -q`,
    testCommand: (tool) => `${tool} test`,
    tasks: ['clean', 'compile'],
  },
  'nodejs-npm': {
    baseImage: 'node:20-alpine',
    setup: APK_GIT,
    tool: 'npm',
    buildCommand: (tool) => `${tool} ci && ${tool} run build`,
    testCommand: (tool) => `${tool} test`,
    tasks: ['install', 'build'],
  },
  'nodejs-yarn': {
    baseImage: 'node:20-alpine',
    setup: APK_GIT,
    tool: 'yarn',
    buildCommand: (tool) => `${tool} install --frozen-lockfile && ${tool} build`,
    testCommand: (tool) => `${tool} test`,
    tasks: ['install', 'build'],
  },
  'python-pip': {
    baseImage: 'python:3.11-slim',
    setup: APT_GIT,
    tool: 'pip',
    buildCommand: (tool) => `${tool} install -r requirements.txt && python -m compileall -q .`,
    testCommand: () => 'pytest',
    tasks: ['install', 'compileall'],
  },
  'python-poetry': {
    baseImage: 'python:3.11-slim',
    setup: `${APT_GIT} && pip install poetry`,
    tool: 'poetry',
    buildCommand: (tool) => `${tool} install && ${tool} build`,
    testCommand: (tool) => `${tool} run pytest`,
    tasks: ['install', 'build'],
  },
  'rust-cargo': {
    baseImage: 'rust:1-slim',
    setup: APT_GIT,
    tool: 'cargo',
    buildCommand: (tool) => `${tool} build --release`,
    testCommand: (tool) => `${tool} test`,
    tasks: ['build'],
  },
  'go-mod': {
    baseImage: 'golang:1.21-alpine',
    setup: APK_GIT,
    tool: 'go',
    buildCommand: (tool) => `${tool} mod download && ${tool} build ./...`,
    testCommand: (tool) => `${tool} test ./...`,
    tasks: ['download', 'build'],
  },
  dotnet: {
    baseImage: 'mcr.microsoft.com/dotnet/sdk:8.0',
    setup: APT_GIT,
    tool: 'dotnet',
    buildCommand: (tool) => `${tool} build`,
    testCommand: (tool) => `${tool} test`,
    tasks: ['build'],
  },
  'ruby-bundler': {
    baseImage: 'ruby:3.3-slim',
    setup: `${APT_GIT} build-essential`,
    tool: 'bundle',
    buildCommand: (tool) => `${tool} install`,
    testCommand: (tool) => `${tool} exec rake test`,
    tasks: ['install'],
  },
};

export function isSupportedProjectType(projectType: ProjectType): projectType is SupportedProjectType {
  return projectType !== 'unknown';
}

/** Local tag of the sandbox image built for a project type. */
export function sandboxImageFor(projectType: SupportedProjectType): string {
  return `pr-verifier/${projectType}:latest`;
}

// Shell runners without a wrapper check pick the wrapper at run time, in the checkout
function preferWrapper(toolchain: Toolchain, command: (tool: string) => string): string {
  if (!toolchain.wrapper) {
    return command(toolchain.tool);
  }
  const { wrapper } = toolchain;
  return (
    `if [ -f ${wrapper} ]; then chmod +x ${wrapper} && ${command(wrapper)}; ` +
    `else ${command(toolchain.tool)}; fi`
  );
}

/** Build command in shell form: the wrapper when the checkout ships one, else the system tool. */
export function shellBuildCommand(toolchain: Toolchain): string {
  return preferWrapper(toolchain, toolchain.buildCommand);
}

/** Test command in the same shell form as shellBuildCommand. */
export function shellTestCommand(toolchain: Toolchain): string {
  return preferWrapper(toolchain, toolchain.testCommand);
}
