import { describe, it, expect } from 'vitest';
import * as path from 'path';
import {
  BuildContextInput,
  createBuildContext,
  detectArchitecture,
  getAppStagingDir,
  isPathInside,
  validateBuildSettings,
} from './context';
import { InvalidBuildContextError } from './errors';

const baseInput: BuildContextInput = {
  version: '1.2.3',
  architecture: 'x86_64',
  workDir: '/tmp/claude-build/work',
  packageName: 'claude-desktop',
  maintainer: 'Test Maintainer',
  description: 'Claude Desktop for Linux',
  buildFormat: 'rpm',
  cleanPolicy: 'yes',
  release: '1',
  outputDir: '/tmp/claude-build/out',
};

describe('context', () => {
  describe('detectArchitecture', () => {
    it('Node.js 아키텍처를 RPM 표기로 변환', () => {
      expect(detectArchitecture('x64')).toBe('x86_64');
      expect(detectArchitecture('arm64')).toBe('aarch64');
    });

    it('지원하지 않는 아키텍처는 에러', () => {
      expect(() => detectArchitecture('ia32')).toThrow(InvalidBuildContextError);
    });
  });

  describe('isPathInside', () => {
    it('하위 경로 판정', () => {
      expect(isPathInside('/a/b/c', '/a/b')).toBe(true);
      expect(isPathInside('/a/b', '/a/b')).toBe(true);
      expect(isPathInside('/a/bc', '/a/b')).toBe(false);
      expect(isPathInside('/a', '/a/b')).toBe(false);
    });
  });

  describe('createBuildContext', () => {
    it('경로를 절대 경로로 만들고 스테이징 디렉토리를 정함', () => {
      const context = createBuildContext({ ...baseInput, workDir: 'relative-work' });
      expect(context.workDir).toBe(path.resolve('relative-work'));
      expect(context.stagingDir).toBe(getAppStagingDir(path.resolve('relative-work')));
      expect(context.version).toBe('1.2.3');
    });

    it('생성된 컨텍스트는 변경 불가', () => {
      const context = createBuildContext(baseInput);
      expect(Object.isFrozen(context)).toBe(true);
    });

    it('잘못된 패키지 이름 거부', () => {
      expect(() => createBuildContext({ ...baseInput, packageName: 'Claude Desktop' })).toThrow(
        '잘못된 빌드 설정 (packageName)'
      );
    });

    it('잘못된 버전 거부', () => {
      expect(() => createBuildContext({ ...baseInput, version: '1.2' })).toThrow('잘못된 빌드 설정 (version)');
    });

    it('잘못된 릴리스 거부', () => {
      expect(() => createBuildContext({ ...baseInput, release: '1-beta' })).toThrow('잘못된 빌드 설정 (release)');
    });

    it('출력 경로가 작업 디렉토리 안이면 거부', () => {
      expect(() =>
        createBuildContext({ ...baseInput, outputDir: '/tmp/claude-build/work/out' })
      ).toThrow('잘못된 빌드 설정 (outputDir)');
    });
  });

  describe('validateBuildSettings', () => {
    it('버전 없이 나머지 설정만 검증', () => {
      const { version: _version, ...settings } = baseInput;
      expect(() => validateBuildSettings(settings)).not.toThrow();
    });
  });
});
