import chalk from 'chalk';
import Table from 'cli-table3';
import { BuildConfig, getConfigManager, isConfigKey, parseConfigValue } from '../../core/config';
import { errorMessage } from '../../core/errors';

/**
 * 점 표기 키로 설정값 조회 (downloadUrls.x86_64 등)
 */
export function readConfigValue(config: BuildConfig, key: string): unknown {
  let current: unknown = config;
  for (const part of key.split('.')) {
    if (typeof current !== 'object' || current === null || !(part in current)) {
      return undefined;
    }
    current = Object.entries(current).find(([name]) => name === part)?.[1];
  }
  return current;
}

/**
 * 설정값 조회
 */
export async function configGet(key?: string): Promise<void> {
  const config = getConfigManager().getConfig();

  if (key) {
    const value = readConfigValue(config, key);
    if (value !== undefined) {
      console.log(chalk.cyan(`${key}: `) + chalk.white(JSON.stringify(value)));
    } else {
      console.log(chalk.yellow(`설정 '${key}'를 찾을 수 없습니다`));
    }
  } else {
    console.log(chalk.cyan('\n현재 설정:'));
    console.log(JSON.stringify(config, null, 2));
  }
}

/**
 * 설정값 변경
 */
export async function configSet(key: string, value: string): Promise<void> {
  try {
    if (!isConfigKey(key)) {
      throw new Error(`알 수 없는 설정 키입니다: ${key}`);
    }
    // release, 버전 문자열은 숫자로 바꾸지 않는다
    const parsedValue = key === 'release' || key === 'electronVersion' ? value : parseConfigValue(value);
    getConfigManager().set(key, parsedValue);
    console.log(chalk.green(`✓ 설정이 저장되었습니다: ${key} = ${JSON.stringify(parsedValue)}`));
  } catch (error) {
    console.error(chalk.red(`설정 저장 실패: ${errorMessage(error)}`));
    process.exit(1);
  }
}

const DESCRIPTIONS: Record<string, string> = {
  packageName: '패키지 이름',
  maintainer: '관리자 (changelog)',
  description: '패키지 요약',
  release: 'RPM 릴리스 번호',
  'downloadUrls.x86_64': 'x86_64 설치 파일 주소',
  'downloadUrls.aarch64': 'aarch64 설치 파일 주소',
  bundleElectron: 'Electron 런타임 포함 여부',
  electronVersion: '포함할 Electron 버전',
  appImageUpdateInfo: 'AppImage 업데이트 정보',
  patchRulesPath: '사용자 패치 규칙 파일',
  workDir: '작업 디렉토리',
  outputDir: '산출물 디렉토리',
  logLevel: '로그 레벨',
};

/**
 * 모든 설정 표시
 */
export async function configList(): Promise<void> {
  const config = getConfigManager().getConfig();

  const table = new Table({
    head: [chalk.cyan('설정'), chalk.cyan('값'), chalk.cyan('설명')],
    colWidths: [25, 50, 30],
    wordWrap: true,
  });

  for (const key of Object.keys(DESCRIPTIONS)) {
    const value = readConfigValue(config, key);
    table.push([key, value === undefined ? chalk.gray('-') : String(value), DESCRIPTIONS[key]]);
  }

  console.log(chalk.cyan('\n설정 목록:\n'));
  console.log(table.toString());
  console.log(chalk.gray(`설정 파일: ${getConfigManager().getConfigPath()}`));
}

/**
 * 설정 초기화
 */
export async function configReset(): Promise<void> {
  try {
    getConfigManager().reset();
    console.log(chalk.green('✓ 설정이 초기화되었습니다'));
  } catch (error) {
    console.error(chalk.red(`설정 초기화 실패: ${errorMessage(error)}`));
    process.exit(1);
  }
}
