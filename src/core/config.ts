import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import { Architecture } from '../types';

// 설정 인터페이스 정의
export interface BuildConfig {
  // 패키지 메타데이터
  packageName: string;
  maintainer: string;
  description: string;
  release: string;

  // 설치 파일 다운로드 주소 (아키텍처별)
  downloadUrls: Record<Architecture, string>;

  // Electron 런타임 번들링
  bundleElectron: boolean;
  electronVersion: string;

  // AppImage 업데이트 정보 (appimagetool -u)
  appImageUpdateInfo?: string;

  // 사용자 정의 패치 규칙 파일
  patchRulesPath?: string;

  // 경로
  workDir: string;
  outputDir: string;

  logLevel: string;
}

// 기본 설정값
export const DEFAULT_CONFIG: BuildConfig = {
  packageName: 'claude-desktop',
  maintainer: 'Claude Desktop Linux Maintainers',
  description: 'Claude Desktop for Linux',
  release: '1',
  downloadUrls: {
    x86_64:
      'https://storage.googleapis.com/osprey-downloads-c02f6a0d-347c-492b-a752-3e0651722e97/nest-win-x64/Claude-Setup-x64.exe',
    aarch64:
      'https://storage.googleapis.com/osprey-downloads-c02f6a0d-347c-492b-a752-3e0651722e97/nest-win-arm64/Claude-Setup-arm64.exe',
  },
  bundleElectron: true,
  electronVersion: 'latest',
  workDir: './build',
  outputDir: '.',
  logLevel: 'info',
};

// set 으로 변경 가능한 키 (중첩 객체는 점 표기)
const SETTABLE_KEYS = [
  'packageName',
  'maintainer',
  'description',
  'release',
  'downloadUrls.x86_64',
  'downloadUrls.aarch64',
  'bundleElectron',
  'electronVersion',
  'appImageUpdateInfo',
  'patchRulesPath',
  'workDir',
  'outputDir',
  'logLevel',
] as const;

export type ConfigKey = (typeof SETTABLE_KEYS)[number];

export function isConfigKey(key: string): key is ConfigKey {
  return (SETTABLE_KEYS as readonly string[]).includes(key);
}

/**
 * CLI 문자열 값을 불리언/숫자/문자열로 변환
 */
export function parseConfigValue(value: string): string | number | boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value.trim() !== '' && !isNaN(Number(value))) return Number(value);
  return value;
}

/**
 * http(s) 주소인지 확인 (downloadUrls.* 설정용)
 */
export function isDownloadUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 저장된 JSON 과 기본값을 병합. 타입이 맞지 않는 항목은 기본값을 쓴다.
 */
export function mergeConfig(raw: unknown): BuildConfig {
  const config: BuildConfig = {
    ...DEFAULT_CONFIG,
    downloadUrls: { ...DEFAULT_CONFIG.downloadUrls },
  };
  if (!isRecord(raw)) return config;
  const record: Record<string, unknown> = raw;

  const pickString = (key: string): string | undefined => {
    const value = record[key];
    return typeof value === 'string' ? value : undefined;
  };

  config.packageName = pickString('packageName') ?? config.packageName;
  config.maintainer = pickString('maintainer') ?? config.maintainer;
  config.description = pickString('description') ?? config.description;
  config.electronVersion = pickString('electronVersion') ?? config.electronVersion;
  config.workDir = pickString('workDir') ?? config.workDir;
  config.outputDir = pickString('outputDir') ?? config.outputDir;
  config.logLevel = pickString('logLevel') ?? config.logLevel;
  config.appImageUpdateInfo = pickString('appImageUpdateInfo');
  config.patchRulesPath = pickString('patchRulesPath');

  // release 는 숫자로 저장되었을 수도 있음
  const release = record.release;
  if (typeof release === 'string' || typeof release === 'number') {
    config.release = String(release);
  }
  const bundleElectron = record.bundleElectron;
  if (typeof bundleElectron === 'boolean') {
    config.bundleElectron = bundleElectron;
  }
  const urls = record.downloadUrls;
  if (isRecord(urls)) {
    if (typeof urls.x86_64 === 'string') config.downloadUrls.x86_64 = urls.x86_64;
    if (typeof urls.aarch64 === 'string') config.downloadUrls.aarch64 = urls.aarch64;
  }
  return config;
}

export class ConfigManager {
  private configDir: string;
  private configPath: string;
  private logsDir: string;

  constructor(baseDir: string = path.join(os.homedir(), '.claude-desktop-linux')) {
    this.configDir = baseDir;
    this.configPath = path.join(this.configDir, 'settings.json');
    this.logsDir = path.join(this.configDir, 'logs');
  }

  /**
   * 필요한 디렉토리들을 생성합니다.
   */
  async ensureDirectories(): Promise<void> {
    await fs.ensureDir(this.configDir);
    await fs.ensureDir(this.logsDir);
  }

  /**
   * 설정을 로드합니다. 파일이 없으면 기본값을 반환합니다.
   */
  async loadConfig(): Promise<BuildConfig> {
    if (!(await fs.pathExists(this.configPath))) {
      return mergeConfig(undefined);
    }
    const raw: unknown = await fs.readJson(this.configPath);
    return mergeConfig(raw);
  }

  /**
   * 설정을 저장합니다.
   */
  async saveConfig(config: BuildConfig): Promise<void> {
    await this.ensureDirectories();
    await fs.writeJson(this.configPath, config, { spaces: 2 });
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getLogsDir(): string {
    return this.logsDir;
  }

  /**
   * 설정값을 동기적으로 조회합니다 (CLI용).
   */
  getConfig(): BuildConfig {
    if (!fs.pathExistsSync(this.configPath)) {
      return mergeConfig(undefined);
    }
    const raw: unknown = fs.readJsonSync(this.configPath);
    return mergeConfig(raw);
  }

  /**
   * 설정값을 동기적으로 변경합니다 (CLI용).
   */
  set(key: string, value: string | number | boolean): BuildConfig {
    if (!isConfigKey(key)) {
      throw new Error(`알 수 없는 설정 키입니다: ${key}`);
    }
    if (key.startsWith('downloadUrls.') && !isDownloadUrl(String(value))) {
      throw new Error(`http(s) 주소가 아닙니다: ${value}`);
    }
    const config = this.getConfig();

    switch (key) {
      case 'downloadUrls.x86_64':
        config.downloadUrls.x86_64 = String(value);
        break;
      case 'downloadUrls.aarch64':
        config.downloadUrls.aarch64 = String(value);
        break;
      case 'bundleElectron':
        if (typeof value !== 'boolean') {
          throw new Error('bundleElectron 은 true 또는 false 여야 합니다');
        }
        config.bundleElectron = value;
        break;
      default:
        config[key] = String(value);
    }

    fs.ensureDirSync(this.configDir);
    fs.writeJsonSync(this.configPath, config, { spaces: 2 });
    return config;
  }

  /**
   * 설정을 동기적으로 초기화합니다 (CLI용).
   */
  reset(): void {
    fs.ensureDirSync(this.configDir);
    fs.writeJsonSync(this.configPath, DEFAULT_CONFIG, { spaces: 2 });
  }
}

// 싱글톤 인스턴스
let configManagerInstance: ConfigManager | null = null;

export function getConfigManager(): ConfigManager {
  if (!configManagerInstance) {
    configManagerInstance = new ConfigManager();
  }
  return configManagerInstance;
}
