/**
 * .desktop 파일 생성 (고정 템플릿)
 */

export interface DesktopEntryOptions {
  /** Exec 에 들어갈 실행 경로. `%u` 는 자동으로 붙는다 */
  exec: string;
  /** 아이콘 테마 이름 또는 절대 경로 */
  icon: string;
}

/** claude:// 링크 처리를 위한 MIME 타입 */
export const URL_SCHEME_MIME_TYPE = 'x-scheme-handler/claude';

export function renderDesktopEntry(options: DesktopEntryOptions): string {
  const lines = [
    '[Desktop Entry]',
    'Name=Claude',
    `Exec=${options.exec} %u`,
    `Icon=${options.icon}`,
    'Type=Application',
    'Terminal=false',
    'Categories=Office;Utility;',
    `MimeType=${URL_SCHEME_MIME_TYPE};`,
    'StartupWMClass=Claude',
  ];
  return lines.join('\n') + '\n';
}
