/**
 * RPM 패키저
 * 설치 트리, postinst, spec 파일을 만들고 rpmbuild 로 패키지를 빌드한다.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { PackageResult } from '../../types';
import { CommandRunner } from '../shared/process-utils';
import { writeTextFile } from '../shared/file-utils';
import { renderLauncherScript } from './launcherScript';
import { stageInstallTree } from './stagingTree';
import { renderPostInstallScript, renderRpmSpec } from './rpmSpec';
import { PackagerStateMachine } from './packagerState';
import { PackageOptions, Packager, escapeRegExp, locateArtifact, runPackagingTool } from './packager';
import logger from '../../utils/logger';

const RPMBUILD_SUBDIRS = ['BUILD', 'RPMS', 'SOURCES', 'SPECS', 'SRPMS'];

export class RpmPackager implements Packager {
  readonly format = 'rpm' as const;

  constructor(private runner: CommandRunner) {}

  async package(options: PackageOptions): Promise<PackageResult> {
    const { context } = options;
    const pkg = context.packageName;
    const stateMachine = new PackagerStateMachine(options.onStateChange);

    try {
      const tree = await stageInstallTree({
        installRoot: path.join(context.workDir, 'package'),
        packageName: pkg,
        staging: options.staging,
        launcherScript: renderLauncherScript({ packageName: pkg, flavour: 'rpm' }),
        desktopExec: `/usr/bin/${pkg}`,
        onWarning: options.onWarning,
      });

      const postInstallScript = renderPostInstallScript(pkg);
      const postInstallScriptPath = path.join(context.workDir, 'postinst.sh');
      await writeTextFile(postInstallScriptPath, postInstallScript, 0o755);

      const specPath = path.join(context.workDir, `${pkg}.spec`);
      await writeTextFile(
        specPath,
        renderRpmSpec({ context, installRoot: tree.installRoot, postInstallScript, iconSizes: tree.iconSizes })
      );
      stateMachine.transition('descriptorsGenerated');

      const topDir = path.join(context.workDir, 'rpmbuild');
      for (const dir of RPMBUILD_SUBDIRS) {
        await fs.ensureDir(path.join(topDir, dir));
      }

      const fileName = `${pkg}-${context.version}-${context.release}.${context.architecture}.rpm`;
      const expectedPath = path.join(context.workDir, context.architecture, fileName);
      await fs.remove(expectedPath);

      stateMachine.transition('invoked');
      await runPackagingTool(this.runner, 'rpmbuild', [
        '--define',
        `_topdir ${topDir}`,
        '--define',
        `_rpmdir ${context.workDir}`,
        '-bb',
        specPath,
      ]);

      const pattern = new RegExp(
        `^${escapeRegExp(pkg)}-${escapeRegExp(context.version)}-.+\\.${escapeRegExp(context.architecture)}\\.rpm$`
      );
      const artifactPath = await locateArtifact(expectedPath, context.workDir, pattern);
      stateMachine.transition('succeeded');

      logger.info('RPM 빌드 완료', { artifactPath });
      return {
        format: 'rpm',
        artifactPath,
        descriptor: {
          installRoot: tree.installRoot,
          desktopEntryPath: tree.desktopEntryPath,
          launcherScriptPath: tree.launcherScriptPath,
          postInstallScriptPath,
          specOrManifestPath: specPath,
        },
        companionFiles: [],
      };
    } catch (error) {
      stateMachine.fail();
      throw error;
    }
  }
}
