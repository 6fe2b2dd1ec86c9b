import cliProgress from 'cli-progress';
import chalk from 'chalk';
import { Architecture, BuildFormat, CleanPolicy, StageName } from '../../types';
import { getConfigManager } from '../../core/config';
import { isBuildError, errorMessage } from '../../core/errors';
import { BuildPipeline } from '../../core/pipeline/buildPipeline';
import logger from '../../utils/logger';

// build 옵션 (commander 가 choices 로 검증한 값)
export interface BuildCommandOptions {
  build: BuildFormat;
  clean: CleanPolicy;
  exe?: string;
  arch?: Architecture;
  workDir?: string;
  outputDir?: string;
}

const STAGE_LABELS: Record<StageName, string> = {
  resolve: '설치 파일 준비',
  extract: '리소스 추출',
  provision: 'Electron 런타임 설치',
  patch: 'app.asar 패치',
  package: '패키지 빌드',
  cleanup: '정리',
  launch: '런처',
};

/**
 * 기본 명령 핸들러: 설치 파일 → 리눅스 패키지
 */
export async function buildCommand(options: BuildCommandOptions): Promise<void> {
  const configManager = getConfigManager();
  await configManager.ensureDirectories();
  const config = await configManager.loadConfig();
  await logger.initialize(config.logLevel);

  const pipeline = new BuildPipeline();
  let progressBar: cliProgress.SingleBar | null = null;
  const stopProgressBar = (): void => {
    progressBar?.stop();
    progressBar = null;
  };

  pipeline.on('stageStart', (stage) => {
    console.log(chalk.cyan(`▶ ${STAGE_LABELS[stage]}...`));
  });
  pipeline.on('stageComplete', (stage, duration) => {
    stopProgressBar();
    console.log(chalk.green(`✓ ${STAGE_LABELS[stage]} 완료`) + chalk.gray(` (${(duration / 1000).toFixed(1)}s)`));
  });
  pipeline.on('warning', (_stage, message) => {
    console.log(chalk.yellow(`  ! ${message}`));
  });
  pipeline.on('downloadProgress', (progress) => {
    if (progress.totalBytes <= 0) return;
    if (!progressBar) {
      progressBar = new cliProgress.SingleBar(
        {
          hideCursor: true,
          format: ' {bar} | {percentage}% | {value}/{total} MB',
        },
        cliProgress.Presets.shades_classic
      );
      progressBar.start(toMegabytes(progress.totalBytes), 0);
    }
    progressBar.update(toMegabytes(progress.downloadedBytes));
  });

  try {
    const result = await pipeline.run({
      config,
      buildFormat: options.build,
      cleanPolicy: options.clean,
      architecture: options.arch,
      installerPath: options.exe,
      workDir: options.workDir,
      outputDir: options.outputDir,
    });

    console.log(chalk.green(`\n✓ 빌드 완료 (${result.version}, ${result.architecture}, ${result.format})`));
    console.log(result.artifactPath);
  } catch (error) {
    stopProgressBar();
    logger.logError(error, '빌드 실패');

    if (isBuildError(error)) {
      console.error(chalk.red(`\n✗ [${error.stage}] ${error.message}`));
      for (const [key, value] of Object.entries(error.details)) {
        if (value === undefined) continue;
        console.error(chalk.red(`  ${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}`));
      }
      process.exit(error.exitCode);
    }

    console.error(chalk.red(`\n✗ ${errorMessage(error)}`));
    process.exit(1);
  }
}

function toMegabytes(bytes: number): number {
  return Math.round((bytes / 1024 / 1024) * 10) / 10;
}
