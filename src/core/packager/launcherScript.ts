/**
 * 런처 스크립트
 *
 * 디스플레이 백엔드 판정, Electron 플래그 조립, 런타임 탐색을 함수로 정의하고
 * 같은 상수로 bash 런처를 생성한다. `diagnose` 명령도 이 함수들을 그대로 사용한다.
 */

import * as path from 'path';
import { NoDisplayEnvironmentError, RuntimeNotFoundError } from '../errors';
import { CommandRunner } from '../shared/process-utils';

/**
 * - x11: X11 세션
 * - x11-on-wayland: Wayland 세션에서 XWayland 사용 (기본값, 전역 단축키 지원)
 * - wayland: 네이티브 Wayland (CLAUDE_USE_WAYLAND=1, 전역 단축키 미지원)
 */
export type DisplayBackend = 'x11' | 'x11-on-wayland' | 'wayland';

/** rpm: /usr 에 설치, appimage: $APPDIR 기준 */
export type LauncherFlavour = 'rpm' | 'appimage';

export type LauncherEnv = Record<string, string | undefined>;

export const COMMON_FLAGS: readonly string[] = ['--disable-features=CustomTitlebar'];

export const BACKEND_FLAGS: Record<DisplayBackend, readonly string[]> = {
  x11: [],
  'x11-on-wayland': ['--no-sandbox', '--ozone-platform=x11'],
  wayland: [
    '--no-sandbox',
    '--enable-features=UseOzonePlatform,WaylandWindowDecorations',
    '--ozone-platform=wayland',
    '--enable-wayland-ime',
    '--wayland-text-input-version=3',
  ],
};

export const RUNTIME_MISSING_MESSAGE =
  'Claude Desktop cannot start because the Electron runtime is missing. Reinstall the package or install Electron globally.';

export function detectDisplayBackend(env: LauncherEnv = process.env): DisplayBackend {
  const hasWayland = Boolean(env.WAYLAND_DISPLAY);
  if (!hasWayland && !env.DISPLAY) {
    throw new NoDisplayEnvironmentError();
  }
  if (!hasWayland) return 'x11';
  return env.CLAUDE_USE_WAYLAND === '1' ? 'wayland' : 'x11-on-wayland';
}

/**
 * 백엔드별 플래그. AppImage 는 FUSE 마운트에서 setuid 샌드박스를 쓸 수 없어 항상 --no-sandbox
 */
export function backendFlags(backend: DisplayBackend, flavour: LauncherFlavour): string[] {
  const flags = [...BACKEND_FLAGS[backend]];
  if (flavour === 'appimage' && !flags.includes('--no-sandbox')) {
    flags.unshift('--no-sandbox');
  }
  return flags;
}

export interface ElectronArgsOptions {
  backend: DisplayBackend;
  appPath: string;
  flavour?: LauncherFlavour;
  userArgs?: string[];
}

/**
 * Electron 인자 목록. 플랫폼 플래그 다음에 앱 경로, 그 뒤에 사용자 인자.
 * 앱 경로보다 뒤에 오는 플래그는 Electron 이 위치 인자로 해석한다.
 */
export function buildElectronArgs(options: ElectronArgsOptions): string[] {
  return [
    ...COMMON_FLAGS,
    ...backendFlags(options.backend, options.flavour ?? 'rpm'),
    options.appPath,
    ...(options.userArgs ?? []),
  ];
}

export interface LauncherPaths {
  appDir: string;
  electronPath: string;
  appPath: string;
}

/**
 * 설치 경로 기준 런처가 참조하는 경로들 (root 는 설치 루트, 기본 '/')
 */
export function getLauncherPaths(packageName: string, root = '/'): LauncherPaths {
  const appDir = path.posix.join(root, 'usr', 'lib', packageName);
  const distDir = path.posix.join(appDir, 'node_modules', 'electron', 'dist');
  return {
    appDir,
    electronPath: path.posix.join(distDir, 'electron'),
    appPath: path.posix.join(distDir, 'resources', 'app.asar'),
  };
}

/**
 * 번들된 Electron 을 먼저, 없으면 PATH 의 electron 을 찾는다
 */
export async function resolveElectronExecutable(
  bundledPath: string,
  runner: Pick<CommandRunner, 'which'>
): Promise<string> {
  const bundled = await runner.which(bundledPath);
  if (bundled) return bundled;

  const global = await runner.which('electron');
  if (global) return global;

  throw new RuntimeNotFoundError([bundledPath, 'electron (PATH)']);
}

export interface LauncherScriptOptions {
  packageName: string;
  flavour: LauncherFlavour;
  /** rpm 런처의 설치 루트 (기본 '/'). appimage 는 항상 $APPDIR 기준 */
  root?: string;
}

function bashArray(values: readonly string[]): string {
  return values.map((value) => `"${value}"`).join(' ');
}

/**
 * bash 런처 생성
 */
export function renderLauncherScript(options: LauncherScriptOptions): string {
  const { packageName, flavour } = options;
  const appDir =
    flavour === 'appimage'
      ? `$APPDIR/usr/lib/${packageName}`
      : getLauncherPaths(packageName, options.root).appDir;
  const lines: string[] = [];

  const pushFlags = (indent: string, flags: readonly string[]): void => {
    if (flags.length > 0) {
      lines.push(`${indent}ELECTRON_ARGS+=(${bashArray(flags)})`);
    }
  };

  lines.push('#!/bin/bash');
  lines.push(`# ${packageName} launcher`);
  lines.push('');

  // 로그 파일
  lines.push(`LOG_DIR="\${XDG_CACHE_HOME:-$HOME/.cache}/${packageName}"`);
  lines.push('mkdir -p "$LOG_DIR"');
  lines.push('LOG_FILE="$LOG_DIR/launcher.log"');
  lines.push(`echo "--- ${packageName} launcher start ---" > "$LOG_FILE"`);
  lines.push('echo "Timestamp: $(date)" >> "$LOG_FILE"');
  lines.push('echo "Arguments: $*" >> "$LOG_FILE"');
  lines.push('');
  lines.push('log() { echo "$1" >> "$LOG_FILE"; }');
  lines.push('fail() { echo "$1" >&2; log "$1"; exit 1; }');
  lines.push('');

  // 디스플레이 확인 (런타임 실행 전)
  lines.push('if [ -z "$DISPLAY" ] && [ -z "$WAYLAND_DISPLAY" ]; then');
  lines.push('  fail "No display detected (TTY session). Run from within an X11 or Wayland session."');
  lines.push('fi');
  lines.push('');

  // 런타임 탐색
  lines.push(`APP_DIR="${appDir}"`);
  lines.push('LOCAL_ELECTRON="$APP_DIR/node_modules/electron/dist/electron"');
  lines.push('APP_PATH="$APP_DIR/node_modules/electron/dist/resources/app.asar"');
  lines.push('');
  lines.push('if [ -x "$LOCAL_ELECTRON" ]; then');
  lines.push('  ELECTRON_EXEC="$LOCAL_ELECTRON"');
  lines.push('elif command -v electron >/dev/null 2>&1; then');
  lines.push('  ELECTRON_EXEC="$(command -v electron)"');
  lines.push('else');
  lines.push(`  MESSAGE="${RUNTIME_MISSING_MESSAGE}"`);
  lines.push('  if command -v zenity >/dev/null 2>&1; then');
  lines.push('    zenity --error --text="$MESSAGE"');
  lines.push('  elif command -v kdialog >/dev/null 2>&1; then');
  lines.push('    kdialog --error "$MESSAGE"');
  lines.push('  fi');
  lines.push('  fail "$MESSAGE (checked $LOCAL_ELECTRON and PATH)"');
  lines.push('fi');
  lines.push('log "Using Electron: $ELECTRON_EXEC"');
  lines.push('');

  // 플래그 조립
  lines.push(`ELECTRON_ARGS=(${bashArray(COMMON_FLAGS)})`);
  lines.push('if [ -n "$WAYLAND_DISPLAY" ]; then');
  lines.push('  if [ "$CLAUDE_USE_WAYLAND" = "1" ]; then');
  lines.push('    log "Using native Wayland backend (global hotkeys may not work)"');
  pushFlags('    ', backendFlags('wayland', flavour));
  lines.push('  else');
  lines.push('    log "Using X11 backend via XWayland. Set CLAUDE_USE_WAYLAND=1 for native Wayland"');
  pushFlags('    ', backendFlags('x11-on-wayland', flavour));
  lines.push('  fi');
  lines.push('else');
  lines.push('  log "X11 session detected"');
  pushFlags('  ', backendFlags('x11', flavour));
  lines.push('fi');
  lines.push('ELECTRON_ARGS+=("$APP_PATH")');
  lines.push('');

  lines.push('export ELECTRON_FORCE_IS_PACKAGED=true');
  lines.push('export ELECTRON_USE_SYSTEM_TITLE_BAR=1');
  lines.push('');
  lines.push('cd "$APP_DIR" || fail "Failed to cd to $APP_DIR"');
  lines.push('log "Executing: $ELECTRON_EXEC ${ELECTRON_ARGS[*]} $*"');
  lines.push('"$ELECTRON_EXEC" "${ELECTRON_ARGS[@]}" "$@" >> "$LOG_FILE" 2>&1');
  lines.push('EXIT_CODE=$?');
  lines.push('log "Electron exited with code: $EXIT_CODE"');
  lines.push('exit $EXIT_CODE');

  return lines.join('\n') + '\n';
}
