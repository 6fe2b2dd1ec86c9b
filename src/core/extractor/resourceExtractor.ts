/**
 * Resource Extractor
 * 설치 파일(Squirrel 인스톨러)에서 nupkg 를 풀고 app.asar 와 아이콘을 꺼낸다.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { StagingTree } from '../../types';
import { ExtractionFailedError, errorMessage, tailLines } from '../errors';
import { getAppStagingDir } from '../context';
import { CommandResult, CommandRunner } from '../shared/process-utils';
import { recreateDir } from '../shared/file-utils';
import { resolveIcons } from './iconResolver';
import logger from '../../utils/logger';

// AnthropicClaude-1.2.3-full.nupkg, AnthropicClaude-1.2.3-arm64-full.nupkg
const NUPKG_PATTERN = /^AnthropicClaude-(\d+\.\d+\.\d+)(?:-[A-Za-z0-9_]+)?-full\.nupkg$/;

/** nupkg 내부의 앱 리소스 경로 */
export const RESOURCES_SUBDIR = path.join('lib', 'net45', 'resources');
const APP_EXE_SUBPATH = path.join('lib', 'net45', 'claude.exe');

export interface ExtractOptions {
  installerPath: string;
  workDir: string;
  onWarning?: (message: string) => void;
}

/**
 * nupkg 파일명에서 버전 추출
 */
export function parseNupkgVersion(fileName: string): string | null {
  const match = NUPKG_PATTERN.exec(fileName);
  return match ? match[1] : null;
}

export class ResourceExtractor {
  constructor(private runner: CommandRunner) {}

  async extract(options: ExtractOptions): Promise<StagingTree> {
    const workDir = path.resolve(options.workDir);
    const extractDir = path.join(workDir, 'claude-extract');
    const warn = (message: string, meta?: Record<string, unknown>): void => {
      logger.warn(message, meta);
      options.onWarning?.(message);
    };

    await recreateDir(extractDir);

    // 1. 인스톨러 압축 해제
    logger.info('설치 파일 압축 해제 중', { installer: options.installerPath });
    await this.run7z(options.installerPath, extractDir);

    // 2. nupkg 찾기 및 버전 확인
    const entries = await fs.readdir(extractDir);
    const nupkg = entries.filter((entry) => NUPKG_PATTERN.test(entry)).sort()[0];
    if (!nupkg) {
      throw new ExtractionFailedError('설치 파일에서 AnthropicClaude-*-full.nupkg 를 찾을 수 없습니다', {
        extractDir,
        entries,
      });
    }
    const version = parseNupkgVersion(nupkg);
    if (!version) {
      throw new ExtractionFailedError(`nupkg 파일명에서 버전을 읽을 수 없습니다: ${nupkg}`);
    }
    logger.info('버전 확인', { version, nupkg });

    // 3. nupkg 압축 해제
    await this.run7z(path.join(extractDir, nupkg), extractDir);

    const resourcesDir = path.join(extractDir, RESOURCES_SUBDIR);
    const appAsar = path.join(resourcesDir, 'app.asar');
    if (!(await fs.pathExists(appAsar))) {
      throw new ExtractionFailedError(`app.asar 가 없습니다: ${appAsar}`, { extractDir });
    }

    // 4. 아이콘 추출 (실패해도 계속 진행)
    await this.extractIcons(extractDir, warn);
    const { icons, missing } = await resolveIcons(extractDir);
    for (const size of missing) {
      warn(`${size}x${size} 아이콘을 찾을 수 없습니다`, { size });
    }

    // 5. 앱 스테이징 디렉토리 구성
    const appDir = getAppStagingDir(workDir);
    await recreateDir(appDir);
    await fs.copy(appAsar, path.join(appDir, 'app.asar'));

    const unpacked = path.join(resourcesDir, 'app.asar.unpacked');
    if (await fs.pathExists(unpacked)) {
      await fs.copy(unpacked, path.join(appDir, 'app.asar.unpacked'));
    } else {
      logger.debug('app.asar.unpacked 없음', { resourcesDir });
    }

    // 6. 트레이 아이콘 / 로케일 파일 목록
    const resourceEntries = (await fs.readdir(resourcesDir)).sort();
    const trayIcons = resourceEntries
      .filter((entry) => entry.startsWith('Tray'))
      .map((entry) => path.join(resourcesDir, entry));
    const localeFiles = resourceEntries
      .filter((entry) => entry.endsWith('.json'))
      .map((entry) => path.join(resourcesDir, entry));

    logger.info('리소스 추출 완료', {
      version,
      icons: Object.keys(icons).length,
      trayIcons: trayIcons.length,
      localeFiles: localeFiles.length,
    });

    return { appDir, version, icons, extractDir, trayIcons, localeFiles };
  }

  private async run7z(archive: string, outputDir: string): Promise<void> {
    let result: CommandResult;
    try {
      result = await this.runner.run('7z', ['x', '-y', archive, `-o${outputDir}`]);
    } catch (error) {
      throw new ExtractionFailedError(`7z 를 실행할 수 없습니다: ${errorMessage(error)}`, { archive });
    }
    if (result.exitCode !== 0) {
      throw new ExtractionFailedError(`7z 압축 해제 실패 (exit ${result.exitCode}): ${archive}`, {
        archive,
        exitCode: result.exitCode,
        stderr: tailLines(result.stderr),
      });
    }
  }

  /**
   * wrestool 로 claude.exe 의 아이콘 그룹을 꺼내고 icotool 로 PNG 로 변환한다
   */
  private async extractIcons(
    extractDir: string,
    warn: (message: string, meta?: Record<string, unknown>) => void
  ): Promise<void> {
    const exePath = path.join(extractDir, APP_EXE_SUBPATH);
    if (!(await fs.pathExists(exePath))) {
      warn(`아이콘을 추출할 실행 파일이 없습니다: ${exePath}`);
      return;
    }

    for (const tool of ['wrestool', 'icotool']) {
      if (!(await this.runner.which(tool))) {
        warn(`${tool} 가 설치되어 있지 않아 아이콘을 추출하지 않습니다 (icoutils 패키지)`);
        return;
      }
    }

    const wrestool = await this.runner.run(
      'wrestool',
      ['-x', '-t', '14', APP_EXE_SUBPATH, '-o', 'claude.ico'],
      { cwd: extractDir }
    );
    if (wrestool.exitCode !== 0) {
      warn(`wrestool 실패 (exit ${wrestool.exitCode})`, { stderr: tailLines(wrestool.stderr, 5) });
      return;
    }

    const icotool = await this.runner.run('icotool', ['-x', 'claude.ico'], { cwd: extractDir });
    if (icotool.exitCode !== 0) {
      warn(`icotool 실패 (exit ${icotool.exitCode})`, { stderr: tailLines(icotool.stderr, 5) });
    }
  }
}
