/**
 * 빌드 파이프라인 에러 분류
 * 모든 스테이지 실패는 치명적이며 파이프라인을 즉시 중단시킨다.
 */

import { StageName } from '../types';

export type BuildErrorCode =
  | 'INPUT_NOT_FOUND'
  | 'DOWNLOAD_FAILED'
  | 'EXTRACTION_FAILED'
  | 'RUNTIME_PROVISION_FAILED'
  | 'PATCH_TARGET_MISSING'
  | 'RUNTIME_NOT_FOUND'
  | 'NO_DISPLAY_ENVIRONMENT'
  | 'PACKAGE_BUILD_FAILED'
  | 'ARTIFACT_NOT_FOUND'
  | 'INVALID_BUILD_CONTEXT';

// 에러 코드별 프로세스 종료 코드
const EXIT_CODES: Record<BuildErrorCode, number> = {
  INPUT_NOT_FOUND: 10,
  DOWNLOAD_FAILED: 11,
  EXTRACTION_FAILED: 20,
  RUNTIME_PROVISION_FAILED: 21,
  PATCH_TARGET_MISSING: 30,
  RUNTIME_NOT_FOUND: 40,
  NO_DISPLAY_ENVIRONMENT: 41,
  PACKAGE_BUILD_FAILED: 50,
  ARTIFACT_NOT_FOUND: 51,
  INVALID_BUILD_CONTEXT: 2,
};

export type ErrorDetails = Record<string, unknown>;

export class BuildError extends Error {
  readonly code: BuildErrorCode;
  readonly stage: StageName;
  readonly details: ErrorDetails;

  constructor(message: string, code: BuildErrorCode, stage: StageName, details: ErrorDetails = {}) {
    super(message);
    this.name = 'BuildError';
    this.code = code;
    this.stage = stage;
    this.details = details;
  }

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }
}

export class InputNotFoundError extends BuildError {
  constructor(installerPath: string) {
    super(`설치 파일을 찾을 수 없습니다: ${installerPath}`, 'INPUT_NOT_FOUND', 'resolve', {
      path: installerPath,
    });
    this.name = 'InputNotFoundError';
  }
}

export class DownloadFailedError extends BuildError {
  constructor(url: string, reason: string, status?: number) {
    super(`다운로드 실패 (${reason}): ${url}`, 'DOWNLOAD_FAILED', 'resolve', { url, status });
    this.name = 'DownloadFailedError';
  }
}

export class ExtractionFailedError extends BuildError {
  constructor(message: string, details?: ErrorDetails, stage: StageName = 'extract') {
    super(message, 'EXTRACTION_FAILED', stage, details);
    this.name = 'ExtractionFailedError';
  }
}

export class RuntimeProvisionFailedError extends BuildError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'RUNTIME_PROVISION_FAILED', 'provision', details);
    this.name = 'RuntimeProvisionFailedError';
  }
}

export class PatchTargetMissingError extends BuildError {
  constructor(ruleId: string, target: string, reason: string) {
    super(`패치 대상을 찾을 수 없습니다 [${ruleId}]: ${reason}`, 'PATCH_TARGET_MISSING', 'patch', {
      rule: ruleId,
      target,
    });
    this.name = 'PatchTargetMissingError';
  }
}

export class RuntimeNotFoundError extends BuildError {
  constructor(checked: string[]) {
    super(`Electron 실행 파일을 찾을 수 없습니다 (확인한 경로: ${checked.join(', ')})`, 'RUNTIME_NOT_FOUND', 'launch', {
      checked,
    });
    this.name = 'RuntimeNotFoundError';
  }
}

export class NoDisplayEnvironmentError extends BuildError {
  constructor() {
    super('DISPLAY, WAYLAND_DISPLAY 모두 설정되어 있지 않습니다 (그래픽 세션이 아님)', 'NO_DISPLAY_ENVIRONMENT', 'launch');
    this.name = 'NoDisplayEnvironmentError';
  }
}

export class PackageBuildFailedError extends BuildError {
  constructor(tool: string, message: string, details?: ErrorDetails) {
    super(`${tool} 실패: ${message}`, 'PACKAGE_BUILD_FAILED', 'package', { tool, ...details });
    this.name = 'PackageBuildFailedError';
  }
}

export class ArtifactNotFoundError extends BuildError {
  constructor(expectedPath: string, searchDir: string) {
    super(`빌드 산출물을 찾을 수 없습니다: ${expectedPath}`, 'ARTIFACT_NOT_FOUND', 'package', {
      expectedPath,
      searchDir,
    });
    this.name = 'ArtifactNotFoundError';
  }
}

export class InvalidBuildContextError extends BuildError {
  constructor(field: string, reason: string, stage: StageName = 'resolve') {
    super(`잘못된 빌드 설정 (${field}): ${reason}`, 'INVALID_BUILD_CONTEXT', stage, { field });
    this.name = 'InvalidBuildContextError';
  }
}

export function isBuildError(error: unknown): error is BuildError {
  return error instanceof BuildError;
}

/**
 * 서브프로세스 출력의 마지막 몇 줄만 남긴다 (에러 메시지용)
 */
export function tailLines(text: string, count = 20): string {
  const lines = text.trimEnd().split('\n');
  return lines.slice(-count).join('\n');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
