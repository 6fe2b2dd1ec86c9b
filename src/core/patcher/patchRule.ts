/**
 * 앵커 기반 소스 패치 규칙
 *
 * 규칙마다 대상 파일(glob), 찾을 문자열(리터럴 또는 정규식), 치환 문자열,
 * 필수 여부를 가진다. 필수 규칙이 아무 것도 바꾸지 못하면 업스트림이 바뀐 것으로 보고
 * PatchTargetMissingError 로 빌드를 중단한다.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { minimatch } from 'minimatch';
import { InvalidBuildContextError, PatchTargetMissingError, errorMessage } from '../errors';
import { listFilesRecursive } from '../shared/file-utils';

export interface PatchRule {
  id: string;
  description: string;
  /** asar 루트 기준 glob 패턴 */
  files: string;
  find: string;
  /** true 면 find 를 정규식으로 해석하고 replace 에서 $1 등을 쓸 수 있다 */
  regex: boolean;
  replace: string;
  required: boolean;
}

export interface PatchRuleResult {
  id: string;
  status: 'applied' | 'skipped';
  /** 실제로 변경된 파일 (asar 루트 기준) */
  files: string[];
  replacements: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * JSON 에서 읽은 규칙 목록 검증
 */
export function validatePatchRules(raw: unknown, source = 'patch-rules'): PatchRule[] {
  if (!Array.isArray(raw)) {
    throw new InvalidBuildContextError(source, '패치 규칙은 배열이어야 합니다', 'patch');
  }

  const ids = new Set<string>();
  return raw.map((item: unknown, index) => {
    if (!isRecord(item)) {
      throw new InvalidBuildContextError(source, `${index}번째 규칙이 객체가 아닙니다`, 'patch');
    }
    for (const key of ['id', 'files', 'find', 'replace']) {
      if (typeof item[key] !== 'string' || item[key] === '') {
        throw new InvalidBuildContextError(source, `${index}번째 규칙의 ${key} 가 올바르지 않습니다`, 'patch');
      }
    }

    const rule: PatchRule = {
      id: String(item.id),
      description: typeof item.description === 'string' ? item.description : '',
      files: String(item.files),
      find: String(item.find),
      regex: item.regex === true,
      replace: String(item.replace),
      required: item.required !== false,
    };

    if (ids.has(rule.id)) {
      throw new InvalidBuildContextError(source, `중복된 규칙 id: ${rule.id}`, 'patch');
    }
    ids.add(rule.id);

    if (rule.regex) {
      try {
        new RegExp(rule.find);
      } catch (error) {
        throw new InvalidBuildContextError(
          source,
          `규칙 ${rule.id} 의 정규식이 잘못되었습니다: ${errorMessage(error)}`,
          'patch'
        );
      }
    }
    return rule;
  });
}

/**
 * 규칙 파일 로드
 */
export async function loadPatchRules(filePath: string): Promise<PatchRule[]> {
  const raw: unknown = await fs.readJson(filePath);
  return validatePatchRules(raw, filePath);
}

/**
 * 텍스트 하나에 규칙 적용. 모든 일치 위치를 치환하고 치환 횟수를 돌려준다.
 */
export function applyRuleToText(rule: PatchRule, text: string): { text: string; count: number } {
  if (rule.regex) {
    const pattern = new RegExp(rule.find, 'g');
    const count = text.match(pattern)?.length ?? 0;
    if (count === 0) return { text, count };
    return { text: text.replace(pattern, rule.replace), count };
  }

  const parts = text.split(rule.find);
  const count = parts.length - 1;
  if (count === 0) return { text, count };
  return { text: parts.join(rule.replace), count };
}

/**
 * 디렉토리(풀어 놓은 asar)에 규칙 적용
 */
export async function applyPatchRule(rule: PatchRule, rootDir: string): Promise<PatchRuleResult> {
  const allFiles = await listFilesRecursive(rootDir);
  const targets = allFiles.filter((file) => minimatch(file, rule.files, { dot: true }));

  if (targets.length === 0) {
    if (rule.required) {
      throw new PatchTargetMissingError(rule.id, rule.files, `대상 파일이 없습니다: ${rule.files}`);
    }
    return { id: rule.id, status: 'skipped', files: [], replacements: 0 };
  }

  const changed: string[] = [];
  let replacements = 0;

  for (const relativePath of targets) {
    const filePath = path.join(rootDir, relativePath);
    const original = await fs.readFile(filePath, 'utf-8');
    const result = applyRuleToText(rule, original);
    if (result.count > 0) {
      await fs.writeFile(filePath, result.text, 'utf-8');
      changed.push(relativePath);
      replacements += result.count;
    }
  }

  if (replacements === 0) {
    if (rule.required) {
      throw new PatchTargetMissingError(
        rule.id,
        rule.files,
        `앵커를 찾을 수 없습니다 (${targets.join(', ')}): ${rule.find}`
      );
    }
    return { id: rule.id, status: 'skipped', files: [], replacements: 0 };
  }

  return { id: rule.id, status: 'applied', files: changed, replacements };
}
