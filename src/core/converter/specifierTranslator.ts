/**
 * PEP 440 지정자 → RPM 비교 절 변환
 *
 * | 지정자      | RPM 절                          |
 * |-------------|---------------------------------|
 * | ==V, ==V.*  | name = V                        |
 * | !=V, !=V.*  | name < V or name > V            |
 * | <V, >=V ... | name < V, name >= V ...         |
 * | ~=V         | name >= V, name < (상한)         |
 * | ===V        | name = V                        |
 *
 * RPM에는 접두사 비교 연산자가 없으므로 와일드카드(.*)는 접두사 버전과의
 * 정확한 비교로 근사합니다. 예: ==1.5.* -> name = 1.5 (1.5.2는 만족하지 않음)
 */

import { formatVersion, parseVersion } from '../shared/pep440-version';
import { encodeVersion } from '../shared/rpm-version';
import {
  compatibleUpperBound,
  formatSpecifier,
  parseSpecifierSet,
  type SpecifierSet,
  type VersionSpecifier,
} from '../shared/specifier';

/**
 * 절에 쓰일 버전 표기
 * - literal: 작성된 그대로 ('-'만 '_'로 치환)
 * - rpm: encodeVersion으로 RPM 순서 보존 인코딩
 */
export type VersionStyle = 'literal' | 'rpm';

export const VERSION_STYLES: readonly VersionStyle[] = ['literal', 'rpm'];

export interface TranslateOptions {
  versionStyle?: VersionStyle;
  strictLocal?: boolean;
}

// RPM 버전 필드에는 '-'를 쓸 수 없음
function literalVersion(text: string): string {
  return text.trim().replace(/-/g, '_');
}

function renderVersion(text: string, options: TranslateOptions): string {
  if (options.versionStyle === 'rpm') {
    return encodeVersion(text, { strictLocal: options.strictLocal });
  }
  parseVersion(text);
  return literalVersion(text);
}

function renderUpperBound(specifier: VersionSpecifier, options: TranslateOptions): string {
  const version = parseVersion(specifier.version);
  const upper = { epoch: version.epoch, release: compatibleUpperBound(version, formatSpecifier(specifier)) };
  return options.versionStyle === 'rpm' ? encodeVersion(upper) : formatVersion(upper);
}

function translateOne(name: string, specifier: VersionSpecifier, options: TranslateOptions): string[] {
  if (specifier.operator === '===') {
    // 임의 문자열 비교: PEP 440 검증 없이 그대로 사용
    return [`${name} = ${literalVersion(specifier.version)}`];
  }

  const version = renderVersion(specifier.version, options);

  switch (specifier.operator) {
    case '==':
      return [`${name} = ${version}`];
    case '!=':
      return [`${name} < ${version} or ${name} > ${version}`];
    case '<':
    case '<=':
    case '>':
    case '>=':
      return [`${name} ${specifier.operator} ${version}`];
    case '~=':
      return [`${name} >= ${version}`, `${name} < ${renderUpperBound(specifier, options)}`];
  }
}

/**
 * 지정자 목록을 RPM 절 목록으로 변환 (선언 순서 유지)
 *
 * @example
 * translateSpecifiers('pkg', '~= 1.5.3b7') // ['pkg >= 1.5.3b7', 'pkg < 1.6']
 * translateSpecifiers('pkg', '') // []
 */
export function translateSpecifiers(
  name: string,
  specifiers: SpecifierSet | string,
  options: TranslateOptions = {}
): string[] {
  const set = typeof specifiers === 'string' ? parseSpecifierSet(specifiers) : specifiers;
  return set.flatMap((specifier) => translateOne(name, specifier, options));
}

/**
 * capability 이름과 버전 절을 합친 텍스트 (절이 없으면 이름만)
 */
export function formatVersionedCapability(
  name: string,
  specifiers: SpecifierSet | string,
  options: TranslateOptions = {}
): string {
  const clauses = translateSpecifiers(name, specifiers, options);
  return clauses.length > 0 ? clauses.join(', ') : name;
}
