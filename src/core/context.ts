/**
 * 빌드 컨텍스트 생성 및 검증
 */

import * as path from 'path';
import {
  ARCHITECTURES,
  Architecture,
  BUILD_FORMATS,
  BuildContext,
  BuildFormat,
  CLEAN_POLICIES,
  CleanPolicy,
} from '../types';
import { InvalidBuildContextError } from './errors';

export interface BuildContextInput {
  version: string;
  architecture: Architecture;
  workDir: string;
  packageName: string;
  maintainer: string;
  description: string;
  buildFormat: BuildFormat;
  cleanPolicy: CleanPolicy;
  release: string;
  outputDir: string;
}

const PACKAGE_NAME_PATTERN = /^[a-z0-9][a-z0-9+._-]*$/;
const VERSION_PATTERN = /^\d+\.\d+\.\d+$/;
const RELEASE_PATTERN = /^[0-9A-Za-z._]+$/;

/** 앱 파일이 모이는 스테이징 디렉토리 */
export function getAppStagingDir(workDir: string): string {
  return path.join(workDir, 'electron-app');
}

/**
 * Node.js 아키텍처 이름을 RPM 아키텍처 이름으로 변환
 */
export function detectArchitecture(nodeArch: string = process.arch): Architecture {
  switch (nodeArch) {
    case 'x64':
      return 'x86_64';
    case 'arm64':
      return 'aarch64';
    default:
      throw new InvalidBuildContextError('architecture', `지원하지 않는 아키텍처입니다: ${nodeArch}`);
  }
}

export function isArchitecture(value: string): value is Architecture {
  return (ARCHITECTURES as readonly string[]).includes(value);
}

export function isBuildFormat(value: string): value is BuildFormat {
  return (BUILD_FORMATS as readonly string[]).includes(value);
}

export function isCleanPolicy(value: string): value is CleanPolicy {
  return (CLEAN_POLICIES as readonly string[]).includes(value);
}

/**
 * child 가 parent 와 같거나 그 하위 경로인지 확인
 */
export function isPathInside(child: string, parent: string): boolean {
  const relative = path.relative(path.resolve(parent), path.resolve(child));
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

export type BuildSettings = Omit<BuildContextInput, 'version'>;

/**
 * 버전을 제외한 설정값 검증. 다운로드 전에 잘못된 설정을 걸러낸다.
 */
export function validateBuildSettings(input: BuildSettings): void {
  if (!PACKAGE_NAME_PATTERN.test(input.packageName)) {
    throw new InvalidBuildContextError('packageName', `패키지 이름 형식이 잘못되었습니다: ${input.packageName}`);
  }
  if (!RELEASE_PATTERN.test(input.release)) {
    throw new InvalidBuildContextError('release', `릴리스 형식이 잘못되었습니다: ${input.release}`);
  }
  if (!isArchitecture(input.architecture)) {
    throw new InvalidBuildContextError('architecture', `지원하지 않는 아키텍처입니다: ${input.architecture}`);
  }
  if (!isBuildFormat(input.buildFormat)) {
    throw new InvalidBuildContextError('buildFormat', `지원하지 않는 형식입니다: ${input.buildFormat}`);
  }
  if (!isCleanPolicy(input.cleanPolicy)) {
    throw new InvalidBuildContextError('cleanPolicy', `yes 또는 no 여야 합니다: ${input.cleanPolicy}`);
  }
  if (isPathInside(input.outputDir, input.workDir)) {
    throw new InvalidBuildContextError(
      'outputDir',
      `출력 경로가 작업 디렉토리 안에 있습니다: ${path.resolve(input.outputDir)}`
    );
  }
}

/**
 * 입력값을 검증하고 변경 불가능한 BuildContext 를 만든다.
 */
export function createBuildContext(input: BuildContextInput): BuildContext {
  validateBuildSettings(input);
  if (!VERSION_PATTERN.test(input.version)) {
    throw new InvalidBuildContextError('version', `버전 형식이 잘못되었습니다: ${input.version}`);
  }

  const workDir = path.resolve(input.workDir);

  return Object.freeze({
    version: input.version,
    architecture: input.architecture,
    workDir,
    stagingDir: getAppStagingDir(workDir),
    packageName: input.packageName,
    maintainer: input.maintainer,
    description: input.description,
    buildFormat: input.buildFormat,
    cleanPolicy: input.cleanPolicy,
    release: input.release,
    outputDir: path.resolve(input.outputDir),
  });
}
