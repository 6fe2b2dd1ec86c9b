/**
 * Input Resolver
 * 로컬 설치 파일 경로 또는 아키텍처별 다운로드 주소로부터 설치 파일 하나를 준비한다.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { Architecture, DownloadProgressEvent, InstallerArtifact } from '../../types';
import { DownloadFailedError, InputNotFoundError, errorMessage } from '../errors';
import { downloadFile, HttpStatusError } from '../shared/file-utils';
import logger from '../../utils/logger';

export interface ResolveOptions {
  architecture: Architecture;
  workDir: string;
  downloadUrls: Record<Architecture, string>;
  /** 지정 시 다운로드 대신 이 파일을 사용 */
  installerPath?: string;
  onProgress?: (progress: DownloadProgressEvent) => void;
}

export class InputResolver {
  async resolve(options: ResolveOptions): Promise<InstallerArtifact> {
    if (options.installerPath) {
      return this.resolveLocal(options.installerPath);
    }
    return this.download(options);
  }

  /**
   * 로컬 설치 파일은 존재 여부만 확인하고 그대로 사용한다
   */
  private async resolveLocal(installerPath: string): Promise<InstallerArtifact> {
    const resolved = path.resolve(installerPath);
    const stat = await fs.stat(resolved).catch(() => null);
    if (!stat || !stat.isFile()) {
      throw new InputNotFoundError(resolved);
    }

    logger.info('로컬 설치 파일 사용', { path: resolved });
    return { path: resolved, sourceKind: 'local' };
  }

  private async download(options: ResolveOptions): Promise<InstallerArtifact> {
    const url = options.downloadUrls[options.architecture];
    let destPath: string;
    try {
      destPath = getDownloadPath(options.workDir, url);
    } catch (error) {
      throw new DownloadFailedError(url, `잘못된 주소: ${errorMessage(error)}`);
    }

    logger.info('설치 파일 다운로드 시작', { url, destPath });

    try {
      await downloadFile(url, destPath, (downloaded, total) => {
        options.onProgress?.({
          downloadedBytes: downloaded,
          totalBytes: total,
          progress: total > 0 ? (downloaded / total) * 100 : 0,
        });
      });
    } catch (error) {
      if (error instanceof HttpStatusError) {
        throw new DownloadFailedError(url, error.message, error.status);
      }
      throw new DownloadFailedError(url, errorMessage(error));
    }

    logger.info('설치 파일 다운로드 완료', { path: destPath });
    return { path: destPath, sourceKind: 'downloaded' };
  }
}

/**
 * 다운로드 파일 저장 위치 (작업 디렉토리 + URL 의 파일명)
 */
export function getDownloadPath(workDir: string, url: string): string {
  const fileName = path.basename(new URL(url).pathname) || 'installer.exe';
  return path.join(path.resolve(workDir), fileName);
}

// 싱글톤 인스턴스
let inputResolverInstance: InputResolver | null = null;

export function getInputResolver(): InputResolver {
  if (!inputResolverInstance) {
    inputResolverInstance = new InputResolver();
  }
  return inputResolverInstance;
}
