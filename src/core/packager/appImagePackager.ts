/**
 * AppImage 패키저
 * <pkg>.AppDir 를 구성하고 appimagetool 로 단일 실행 파일을 만든다.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { PackageResult } from '../../types';
import { PackageBuildFailedError } from '../errors';
import { largestIcon } from '../extractor/iconResolver';
import { CommandRunner } from '../shared/process-utils';
import { writeTextFile } from '../shared/file-utils';
import { renderDesktopEntry } from './desktopEntry';
import { renderLauncherScript } from './launcherScript';
import { stageInstallTree } from './stagingTree';
import { PackagerStateMachine } from './packagerState';
import { PackageOptions, Packager, escapeRegExp, locateArtifact, runPackagingTool } from './packager';
import logger from '../../utils/logger';

export class AppImagePackager implements Packager {
  readonly format = 'appimage' as const;

  constructor(private runner: CommandRunner) {}

  async package(options: PackageOptions): Promise<PackageResult> {
    const { context } = options;
    const pkg = context.packageName;
    const stateMachine = new PackagerStateMachine(options.onStateChange);

    try {
      // appimagetool 은 AppDir 루트에 아이콘이 반드시 있어야 한다
      const icon = largestIcon(options.staging.icons);
      if (!icon) {
        throw new PackageBuildFailedError('appimagetool', 'AppImage 에 넣을 아이콘이 하나도 없습니다');
      }

      const appDir = path.join(context.workDir, `${pkg}.AppDir`);
      const launcherScript = renderLauncherScript({ packageName: pkg, flavour: 'appimage' });
      const tree = await stageInstallTree({
        installRoot: appDir,
        packageName: pkg,
        staging: options.staging,
        launcherScript,
        desktopExec: pkg,
        onWarning: options.onWarning,
      });

      await writeTextFile(path.join(appDir, 'AppRun'), launcherScript, 0o755);
      const manifestPath = path.join(appDir, `${pkg}.desktop`);
      await writeTextFile(manifestPath, renderDesktopEntry({ exec: pkg, icon: pkg }));
      await fs.copy(icon, path.join(appDir, `${pkg}.png`));
      stateMachine.transition('descriptorsGenerated');

      const fileName = `${pkg}-${context.version}-${context.architecture}.AppImage`;
      const expectedPath = path.join(context.workDir, fileName);
      await fs.remove(expectedPath);

      const args = options.appImageUpdateInfo ? ['-u', options.appImageUpdateInfo] : [];
      args.push(appDir, expectedPath);

      stateMachine.transition('invoked');
      await runPackagingTool(this.runner, 'appimagetool', args, {
        cwd: context.workDir,
        env: { ...process.env, ARCH: context.architecture },
      });

      const pattern = new RegExp(
        `^${escapeRegExp(pkg)}-${escapeRegExp(context.version)}-${escapeRegExp(context.architecture)}\\.AppImage$`
      );
      const artifactPath = await locateArtifact(expectedPath, context.workDir, pattern);
      await fs.chmod(artifactPath, 0o755);

      // 출력 디렉토리로 옮긴 뒤의 AppImage 를 실행하는 .desktop
      const finalPath = path.join(context.outputDir, path.basename(artifactPath));
      const desktopPath = path.join(context.workDir, `${pkg}.desktop`);
      await writeTextFile(desktopPath, renderDesktopEntry({ exec: finalPath, icon: pkg }));
      stateMachine.transition('succeeded');

      logger.info('AppImage 빌드 완료', { artifactPath });
      return {
        format: 'appimage',
        artifactPath,
        descriptor: {
          installRoot: appDir,
          desktopEntryPath: tree.desktopEntryPath,
          launcherScriptPath: tree.launcherScriptPath,
          specOrManifestPath: manifestPath,
        },
        companionFiles: [desktopPath],
      };
    } catch (error) {
      stateMachine.fail();
      throw error;
    }
  }
}
