/**
 * 패키저 공통 인터페이스와 도구 실행, 산출물 탐색
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { BuildContext, BuildFormat, PackageResult, PackagerState, StagingTree } from '../../types';
import { ArtifactNotFoundError, PackageBuildFailedError, errorMessage, tailLines } from '../errors';
import { CommandResult, CommandRunner, RunOptions } from '../shared/process-utils';
import logger from '../../utils/logger';

export interface PackageOptions {
  context: BuildContext;
  staging: StagingTree;
  /** AppImage 업데이트 정보 (appimagetool -u) */
  appImageUpdateInfo?: string;
  onWarning?: (message: string) => void;
  onStateChange?: (state: PackagerState) => void;
}

export interface Packager {
  readonly format: BuildFormat;
  package(options: PackageOptions): Promise<PackageResult>;
}

/**
 * 패키징 도구 실행. 실행 불가 또는 0 이 아닌 종료 코드는 PackageBuildFailedError
 */
export async function runPackagingTool(
  runner: CommandRunner,
  tool: string,
  args: string[],
  options?: RunOptions
): Promise<CommandResult> {
  logger.info(`${tool} 실행`, { args });

  let result: CommandResult;
  try {
    result = await runner.run(tool, args, options);
  } catch (error) {
    throw new PackageBuildFailedError(tool, `실행할 수 없습니다: ${errorMessage(error)}`);
  }

  if (result.exitCode !== 0) {
    throw new PackageBuildFailedError(tool, `exit ${result.exitCode}`, {
      exitCode: result.exitCode,
      stderr: tailLines(result.stderr),
    });
  }
  return result;
}

async function searchFiles(dir: string, pattern: RegExp, depth: number): Promise<string[]> {
  if (depth < 1 || !(await fs.pathExists(dir))) return [];

  const found: string[] = [];
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isFile() && pattern.test(entry.name)) {
      found.push(fullPath);
    } else if (entry.isDirectory()) {
      found.push(...(await searchFiles(fullPath, pattern, depth - 1)));
    }
  }
  return found;
}

/**
 * 도구가 만들기로 되어 있는 경로를 먼저 확인하고,
 * 없을 때만 searchDir 아래(깊이 2)에서 파일명 패턴으로 찾는다.
 */
export async function locateArtifact(expectedPath: string, searchDir: string, pattern: RegExp): Promise<string> {
  if (await fs.pathExists(expectedPath)) {
    return expectedPath;
  }

  const candidates = (await searchFiles(searchDir, pattern, 2)).sort();
  if (candidates.length > 0) {
    logger.warn('예상 경로에 산출물이 없어 검색 결과를 사용합니다', {
      expectedPath,
      found: candidates[0],
      candidates: candidates.length,
    });
    return candidates[0];
  }

  throw new ArtifactNotFoundError(expectedPath, searchDir);
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
