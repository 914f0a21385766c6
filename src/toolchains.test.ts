import { describe, it, expect } from 'vitest';
import { TOOLCHAINS, sandboxImageFor, shellBuildCommand, shellTestCommand } from './toolchains.js';

describe('toolchains', () => {
  it('runs the gradle build without tests', () => {
    expect(TOOLCHAINS['java-gradle'].buildCommand('./gradlew')).toBe(
      './gradlew clean build -x test --no-daemon --stacktrace'
    );
  });

  it('prefers the wrapper in shell form', () => {
    expect(shellBuildCommand(TOOLCHAINS['java-maven'])).toBe(
      'if [ -f ./mvnw ]; then chmod +x ./mvnw && ./mvnw clean compile -DskipTests -q; ' +
      'else mvn clean compile -DskipTests -q; fi'
    );
  });

  it('uses the tool directly when there is no wrapper', () => {
    expect(shellBuildCommand(TOOLCHAINS['go-mod'])).toBe('go mod download && go build ./...');
  });

  it('gives test commands the same wrapper fallback', () => {
    expect(shellTestCommand(TOOLCHAINS['java-maven'])).toBe(
      'if [ -f ./mvnw ]; then chmod +x ./mvnw && ./mvnw test; else mvn test; fi'
    );
    expect(shellTestCommand(TOOLCHAINS['go-mod'])).toBe('go test ./...');
  });

  it('tags sandbox images per project type', () => {
    expect(sandboxImageFor('rust-cargo')).toBe('pr-verifier/rust-cargo:latest');
  });
});
