/**
 * Cleanup/Reporting
 * 산출물을 출력 디렉토리로 옮기고, 정리 정책에 따라 작업 디렉토리를 지운다.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { BuildContext, InstallerArtifact, PackageResult } from '../../types';
import { isPathInside } from '../context';
import logger from '../../utils/logger';

export interface FinalizeResult {
  artifactPath: string;
  companionFiles: string[];
  cleaned: boolean;
}

/**
 * keepPath 만 남기고 dir 아래를 지운다
 */
async function removeExcept(dir: string, keepPath: string): Promise<void> {
  for (const entry of await fs.readdir(dir)) {
    const entryPath = path.join(dir, entry);
    if (entryPath === keepPath) continue;
    if (isPathInside(keepPath, entryPath)) {
      await removeExcept(entryPath, keepPath);
    } else {
      await fs.remove(entryPath);
    }
  }
}

/**
 * 작업 디렉토리 정리. 사용자가 지정한 로컬 설치 파일은 지우지 않는다.
 */
export async function cleanWorkDir(workDir: string, installer?: InstallerArtifact): Promise<void> {
  if (!(await fs.pathExists(workDir))) return;

  if (installer?.sourceKind === 'local' && isPathInside(installer.path, workDir)) {
    logger.info('로컬 설치 파일을 남기고 작업 디렉토리를 정리합니다', { workDir, installer: installer.path });
    await removeExcept(path.resolve(workDir), path.resolve(installer.path));
    return;
  }

  await fs.remove(workDir);
  logger.info('작업 디렉토리 삭제', { workDir });
}

export async function finalizeBuild(
  context: BuildContext,
  result: PackageResult,
  installer?: InstallerArtifact
): Promise<FinalizeResult> {
  await fs.ensureDir(context.outputDir);

  const artifactPath = path.join(context.outputDir, path.basename(result.artifactPath));
  await fs.move(result.artifactPath, artifactPath, { overwrite: true });

  const companionFiles: string[] = [];
  for (const file of result.companionFiles) {
    const target = path.join(context.outputDir, path.basename(file));
    await fs.move(file, target, { overwrite: true });
    companionFiles.push(target);
  }

  logger.info('산출물 이동 완료', { artifactPath, companionFiles });

  const cleaned = context.cleanPolicy === 'yes';
  if (cleaned) {
    await cleanWorkDir(context.workDir, installer);
  } else {
    logger.info('중간 산출물을 남겨 둡니다', { workDir: context.workDir });
  }

  return { artifactPath, companionFiles, cleaned };
}
