import chalk from 'chalk';
import { getConfigManager } from '../../core/config';
import { isBuildError, errorMessage } from '../../core/errors';
import {
  DisplayBackend,
  LauncherFlavour,
  buildElectronArgs,
  detectDisplayBackend,
  getLauncherPaths,
  resolveElectronExecutable,
} from '../../core/packager/launcherScript';
import { getProcessRunner } from '../../core/shared/process-utils';

interface DiagnoseOptions {
  flavour: LauncherFlavour;
  /** AppImage 는 $APPDIR 기준 */
  root?: string;
}

const BACKEND_LABELS: Record<DisplayBackend, string> = {
  x11: 'X11',
  'x11-on-wayland': 'X11 (XWayland), 전역 단축키 지원',
  wayland: '네이티브 Wayland, 전역 단축키 미지원',
};

/**
 * 설치된 런처가 현재 환경에서 고를 디스플레이 백엔드, 인자, 런타임을 보여준다
 */
export async function diagnoseCommand(options: DiagnoseOptions): Promise<void> {
  const { packageName } = getConfigManager().getConfig();
  const root = options.root ?? (options.flavour === 'appimage' ? process.env.APPDIR ?? '/' : '/');
  const paths = getLauncherPaths(packageName, root);

  try {
    const backend = detectDisplayBackend(process.env);
    console.log(chalk.cyan('디스플레이 백엔드: ') + BACKEND_LABELS[backend]);

    const args = buildElectronArgs({ backend, appPath: paths.appPath, flavour: options.flavour });
    console.log(chalk.cyan('Electron 인자:'));
    for (const arg of args) {
      console.log(`  ${arg}`);
    }

    const electron = await resolveElectronExecutable(paths.electronPath, getProcessRunner());
    console.log(chalk.cyan('Electron 실행 파일: ') + electron);
    console.log(chalk.cyan('작업 디렉토리: ') + paths.appDir);
  } catch (error) {
    if (isBuildError(error)) {
      console.error(chalk.red(`✗ ${error.message}`));
      process.exit(error.exitCode);
    }
    console.error(chalk.red(`✗ ${errorMessage(error)}`));
    process.exit(1);
  }
}
