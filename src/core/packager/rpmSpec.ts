/**
 * RPM spec 파일과 설치 후(%post) 스크립트 생성
 */

import * as path from 'path';
import { BuildContext, IconSize } from '../../types';
import { getLauncherPaths } from './launcherScript';
import { iconInstallPath } from './stagingTree';

const DAY_NAMES = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTH_NAMES = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

/**
 * %changelog 날짜 형식 (`date "+%a %b %d %Y"`), 로케일과 무관하게 영문
 */
export function formatChangelogDate(date: Date): string {
  const day = String(date.getDate()).padStart(2, '0');
  return `${DAY_NAMES[date.getDay()]} ${MONTH_NAMES[date.getMonth()]} ${day} ${date.getFullYear()}`;
}

/**
 * chrome-sandbox 권한 설정. 실패해도 설치는 계속되어야 하므로 항상 exit 0
 */
export function renderPostInstallScript(packageName: string): string {
  const sandboxPath = path.posix.join(path.posix.dirname(getLauncherPaths(packageName).electronPath), 'chrome-sandbox');
  const lines = [
    '#!/bin/sh',
    '',
    'echo "Updating desktop database..."',
    'update-desktop-database /usr/share/applications >/dev/null 2>&1 || true',
    '',
    'echo "Setting chrome-sandbox permissions..."',
    `SANDBOX_PATH="${sandboxPath}"`,
    'if [ -f "$SANDBOX_PATH" ]; then',
    '    chown root:root "$SANDBOX_PATH" || echo "Warning: Failed to chown chrome-sandbox"',
    '    chmod 4755 "$SANDBOX_PATH" || echo "Warning: Failed to chmod chrome-sandbox"',
    '    echo "Permissions set for $SANDBOX_PATH"',
    'else',
    '    echo "Warning: chrome-sandbox not found at $SANDBOX_PATH. Sandbox may not function correctly."',
    'fi',
    '',
    'exit 0',
  ];
  return lines.join('\n') + '\n';
}

export interface RpmSpecOptions {
  context: BuildContext;
  /** %install 에서 %{buildroot} 로 복사할 설치 트리 */
  installRoot: string;
  postInstallScript: string;
  iconSizes: IconSize[];
  date?: Date;
}

export function renderRpmSpec(options: RpmSpecOptions): string {
  const { context, installRoot, iconSizes } = options;
  const pkg = context.packageName;
  const date = formatChangelogDate(options.date ?? new Date());

  const lines: string[] = [];

  // Electron 바이너리는 이미 빌드된 것이라 debuginfo, strip 을 끈다
  lines.push('%define debug_package %{nil}');
  lines.push('%global __os_install_post %{nil}');
  lines.push('');
  lines.push(`Name:           ${pkg}`);
  lines.push(`Version:        ${context.version}`);
  lines.push(`Release:        ${context.release}`);
  lines.push(`Summary:        ${context.description}`);
  lines.push('License:        Proprietary');
  lines.push('URL:            https://claude.ai');
  lines.push(`BuildArch:      ${context.architecture}`);
  lines.push('AutoReqProv:    no');
  lines.push('');
  lines.push('%description');
  lines.push('Claude is an AI assistant from Anthropic.');
  lines.push('This package provides the desktop interface for Claude.');
  lines.push('');
  lines.push('%install');
  lines.push('rm -rf %{buildroot}');
  lines.push('mkdir -p %{buildroot}');
  lines.push(`cp -a "${installRoot}/." %{buildroot}/`);
  lines.push('');
  lines.push('%post');
  lines.push(options.postInstallScript.trimEnd());
  lines.push('');
  lines.push('%files');
  lines.push('%defattr(-,root,root,-)');
  lines.push(`/usr/bin/${pkg}`);
  lines.push(`/usr/lib/${pkg}`);
  lines.push(`/usr/share/applications/${pkg}.desktop`);
  for (const size of iconSizes) {
    lines.push(`/${iconInstallPath(size, pkg)}`);
  }
  lines.push('');
  lines.push('%changelog');
  lines.push(`* ${date} ${context.maintainer} - ${context.version}-${context.release}`);
  lines.push(`- Claude Desktop version ${context.version}`);

  return lines.join('\n') + '\n';
}
