/**
 * 설치 트리 구성 (RPM, AppImage 공통)
 *
 * {installRoot}/usr/{bin, lib/<pkg>, share/applications, share/icons/hicolor/<s>x<s>/apps}
 * 매 실행마다 처음부터 다시 만든다.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { ICON_SIZES, IconSize, StagingTree } from '../../types';
import { recreateDir, writeTextFile } from '../shared/file-utils';
import { renderDesktopEntry } from './desktopEntry';
import logger from '../../utils/logger';

export interface InstallTreeOptions {
  installRoot: string;
  packageName: string;
  staging: Pick<StagingTree, 'appDir' | 'icons'>;
  launcherScript: string;
  /** .desktop 의 Exec 값 */
  desktopExec: string;
  onWarning?: (message: string) => void;
}

export interface InstallTree {
  installRoot: string;
  launcherScriptPath: string;
  desktopEntryPath: string;
  libDir: string;
  /** Electron 의 process.resourcesPath 에 해당하는 디렉토리 */
  resourcesDir: string;
  /** 실제로 복사된 아이콘 크기 */
  iconSizes: IconSize[];
}

export function iconInstallPath(size: IconSize, packageName: string): string {
  return path.posix.join('usr', 'share', 'icons', 'hicolor', `${size}x${size}`, 'apps', `${packageName}.png`);
}

export async function stageInstallTree(options: InstallTreeOptions): Promise<InstallTree> {
  const { installRoot, packageName, staging } = options;
  const usrDir = path.join(installRoot, 'usr');
  const libDir = path.join(usrDir, 'lib', packageName);
  const applicationsDir = path.join(usrDir, 'share', 'applications');

  await recreateDir(installRoot);
  await fs.ensureDir(path.join(usrDir, 'bin'));
  await fs.ensureDir(libDir);
  await fs.ensureDir(applicationsDir);

  // 아이콘: 없는 크기는 경고만 하고 디렉토리는 만든다
  const iconSizes: IconSize[] = [];
  for (const size of ICON_SIZES) {
    const target = path.join(installRoot, iconInstallPath(size, packageName));
    await fs.ensureDir(path.dirname(target));
    const source = staging.icons[size];
    if (source) {
      await fs.copy(source, target);
      iconSizes.push(size);
    } else {
      const message = `${size}x${size} 아이콘이 없어 설치하지 않습니다`;
      logger.warn(message, { size });
      options.onWarning?.(message);
    }
  }

  // Electron 런타임 (번들된 경우)
  const nodeModules = path.join(staging.appDir, 'node_modules');
  if (await fs.pathExists(nodeModules)) {
    await fs.copy(nodeModules, path.join(libDir, 'node_modules'));
  }

  const resourcesDir = path.join(libDir, 'node_modules', 'electron', 'dist', 'resources');
  await fs.ensureDir(resourcesDir);
  await fs.copy(path.join(staging.appDir, 'app.asar'), path.join(resourcesDir, 'app.asar'));
  const unpacked = path.join(staging.appDir, 'app.asar.unpacked');
  if (await fs.pathExists(unpacked)) {
    await fs.copy(unpacked, path.join(resourcesDir, 'app.asar.unpacked'));
  }

  const desktopEntryPath = path.join(applicationsDir, `${packageName}.desktop`);
  await writeTextFile(desktopEntryPath, renderDesktopEntry({ exec: options.desktopExec, icon: packageName }));

  const launcherScriptPath = path.join(usrDir, 'bin', packageName);
  await writeTextFile(launcherScriptPath, options.launcherScript, 0o755);

  logger.info('설치 트리 구성 완료', { installRoot, icons: iconSizes });

  return { installRoot, launcherScriptPath, desktopEntryPath, libDir, resourcesDir, iconSizes };
}
