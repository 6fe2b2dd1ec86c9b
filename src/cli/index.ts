#!/usr/bin/env node

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { ARCHITECTURES, BUILD_FORMATS, CLEAN_POLICIES } from '../types';
import { isArchitecture, isBuildFormat, isCleanPolicy } from '../core/context';
import { InvalidBuildContextError } from '../core/errors';
import type { BuildCommandOptions } from './commands/build';

// 버전 정보
const VERSION = '1.0.0';

interface RootOptions {
  build: string;
  clean: string;
  exe?: string;
  arch?: string;
  workDir?: string;
  outputDir?: string;
}

/**
 * commander 가 choices 로 검증한 문자열을 타입으로 좁힌다
 */
function toBuildCommandOptions(options: RootOptions): BuildCommandOptions {
  if (!isBuildFormat(options.build)) {
    throw new InvalidBuildContextError('build', `rpm 또는 appimage 여야 합니다: ${options.build}`);
  }
  if (!isCleanPolicy(options.clean)) {
    throw new InvalidBuildContextError('clean', `yes 또는 no 여야 합니다: ${options.clean}`);
  }
  if (options.arch !== undefined && !isArchitecture(options.arch)) {
    throw new InvalidBuildContextError('arch', `지원하지 않는 아키텍처입니다: ${options.arch}`);
  }
  return {
    build: options.build,
    clean: options.clean,
    exe: options.exe,
    arch: options.arch,
    workDir: options.workDir,
    outputDir: options.outputDir,
  };
}

// 메인 프로그램
const program = new Command();

program
  .name('claude-desktop-build')
  .description(chalk.cyan('Claude Desktop Windows 설치 파일을 RPM / AppImage 로 변환'))
  .version(VERSION, '-v, --version', '버전 정보 표시')
  .helpOption('-h, --help', '도움말 표시')
  .addOption(new Option('-b, --build <format>', '출력 형식').choices(BUILD_FORMATS).default('rpm'))
  .addOption(new Option('-c, --clean <policy>', '빌드 후 작업 디렉토리 삭제').choices(CLEAN_POLICIES).default('yes'))
  .option('-e, --exe <path>', '다운로드 대신 사용할 로컬 설치 파일 (.exe)')
  .addOption(new Option('-a, --arch <arch>', '대상 아키텍처 (기본: 호스트)').choices(ARCHITECTURES))
  .option('-w, --work-dir <dir>', '작업 디렉토리 (기본: 설정의 workDir)')
  .option('-o, --output-dir <dir>', '산출물 디렉토리 (기본: 설정의 outputDir)')
  .action(async () => {
    const { buildCommand } = await import('./commands/build');
    await buildCommand(toBuildCommandOptions(program.opts<RootOptions>()));
  });

// config 명령어
program
  .command('config')
  .description('설정 관리')
  .addCommand(
    new Command('get')
      .description('설정값 조회')
      .argument('[key]', '설정 키 (downloadUrls.x86_64 처럼 점 표기)')
      .action(async (key?: string) => {
        const { configGet } = await import('./commands/config');
        await configGet(key);
      })
  )
  .addCommand(
    new Command('set')
      .description('설정값 변경')
      .argument('<key>', '설정 키')
      .argument('<value>', '설정값')
      .action(async (key: string, value: string) => {
        const { configSet } = await import('./commands/config');
        await configSet(key, value);
      })
  )
  .addCommand(
    new Command('list')
      .description('모든 설정 표시')
      .action(async () => {
        const { configList } = await import('./commands/config');
        await configList();
      })
  )
  .addCommand(
    new Command('reset')
      .description('설정 초기화')
      .action(async () => {
        const { configReset } = await import('./commands/config');
        await configReset();
      })
  );

// diagnose 명령어
program
  .command('diagnose')
  .description('설치된 런처가 현재 환경에서 선택할 백엔드, 인자, 런타임 표시')
  .option('--appimage', 'AppImage 런처 기준 ($APPDIR)')
  .option('--root <dir>', '설치 루트 (기본: /)')
  .action(async (options: { appimage?: boolean; root?: string }) => {
    const { diagnoseCommand } = await import('./commands/diagnose');
    await diagnoseCommand({ flavour: options.appimage ? 'appimage' : 'rpm', root: options.root });
  });

// 에러 핸들링
program.exitOverride((err) => {
  if (err.code === 'commander.help' || err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  console.error(chalk.red(`오류: ${err.message}`));
  process.exit(1);
});

// 파싱 및 실행
program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(`오류: ${error instanceof Error ? error.message : String(error)}`));
  process.exit(1);
});
