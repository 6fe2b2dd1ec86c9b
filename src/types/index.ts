// ============================================
// 빌드 설정 관련 타입
// ============================================

/** 지원하는 아키텍처 (RPM 표기) */
export type Architecture = 'x86_64' | 'aarch64';

/** 출력 패키지 형식 */
export type BuildFormat = 'rpm' | 'appimage';

/** 중간 산출물 정리 여부 */
export type CleanPolicy = 'yes' | 'no';

export const ARCHITECTURES: readonly Architecture[] = ['x86_64', 'aarch64'];
export const BUILD_FORMATS: readonly BuildFormat[] = ['rpm', 'appimage'];
export const CLEAN_POLICIES: readonly CleanPolicy[] = ['yes', 'no'];

/**
 * 빌드 컨텍스트
 * 버전이 확정된 뒤 한 번 생성되고 이후 모든 스테이지에 그대로 전달된다.
 */
export interface BuildContext {
  readonly version: string;
  readonly architecture: Architecture;
  readonly workDir: string;
  /** 추출된 앱 파일(app.asar 등)이 모이는 디렉토리 */
  readonly stagingDir: string;
  readonly packageName: string;
  readonly maintainer: string;
  readonly description: string;
  readonly buildFormat: BuildFormat;
  readonly cleanPolicy: CleanPolicy;
  readonly release: string;
  /** 최종 산출물이 옮겨지는 디렉토리 */
  readonly outputDir: string;
}

// ============================================
// 스테이지 산출물 타입
// ============================================

/** 설치 파일 출처 */
export type InstallerSourceKind = 'downloaded' | 'local';

/** Input Resolver 결과 */
export interface InstallerArtifact {
  path: string;
  sourceKind: InstallerSourceKind;
}

/** 패키지에 포함하는 아이콘 크기 (픽셀) */
export const ICON_SIZES = [16, 24, 32, 48, 64, 256] as const;
export type IconSize = (typeof ICON_SIZES)[number];

/** 크기별 아이콘 파일 경로. 추출되지 않은 크기는 빠진다 */
export type ResolvedIcons = Partial<Record<IconSize, string>>;

/** Resource Extractor 결과 */
export interface StagingTree {
  /** app.asar, app.asar.unpacked (및 node_modules) 위치 */
  appDir: string;
  version: string;
  icons: ResolvedIcons;
  /** 인스톨러에서 풀어낸 원본 디렉토리 */
  extractDir: string;
  /** 트레이 아이콘 파일 (asar 내부 resources/ 로 복사) */
  trayIcons: string[];
  /** 로케일 JSON 파일 (asar 내부 resources/i18n/ 로 복사) */
  localeFiles: string[];
}

/** 패키저가 만들어 내는 파일 경로 모음 */
export interface PackageDescriptor {
  installRoot: string;
  desktopEntryPath: string;
  launcherScriptPath: string;
  postInstallScriptPath?: string;
  specOrManifestPath: string;
}

/** 패키저 상태 */
export type PackagerState =
  | 'staged'
  | 'descriptorsGenerated'
  | 'invoked'
  | 'succeeded'
  | 'failed';

/** 패키저 결과 */
export interface PackageResult {
  format: BuildFormat;
  artifactPath: string;
  descriptor: PackageDescriptor;
  /** 산출물과 함께 출력 디렉토리로 옮길 파일 (.desktop 등) */
  companionFiles: string[];
}

// ============================================
// 파이프라인 타입
// ============================================

/** 파이프라인 스테이지 이름 */
export type StageName =
  | 'resolve'
  | 'extract'
  | 'provision'
  | 'patch'
  | 'package'
  | 'cleanup'
  | 'launch';

/** 빌드 결과 */
export interface BuildResult {
  artifactPath: string;
  version: string;
  architecture: Architecture;
  format: BuildFormat;
  cleaned: boolean;
  duration: number;
}

/** 다운로드 진행률 이벤트 */
export interface DownloadProgressEvent {
  downloadedBytes: number;
  totalBytes: number;
  progress: number;
}
