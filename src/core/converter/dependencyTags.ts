/**
 * 패키지 메타데이터 → RPM 의존성 태그 라인
 *
 * BuildRequires, Requires, 선택 의존성 태그(기본: Suggests)를 만듭니다.
 * 빈 태그는 출력하지 않습니다.
 */

import logger from '../../utils/logger';
import type { PackageMetadata } from '../shared/package-metadata';
import { formatVersionedCapability, type VersionStyle } from './specifierTranslator';
import type { RequirementConverter } from './requirementConverter';

export interface DependencyTagOptions {
  /** 그대로 추가할 RPM Requires 항목 */
  requires: string[];
  /** 그대로 추가할 선택 의존성 항목 */
  suggests: string[];
  /** Requires에 포함할 extra 패턴 (*, ? 지원) */
  requiresExtras: string[];
  /** 선택 의존성에 포함할 extra 패턴 */
  suggestsExtras: string[];
  /** 선택 의존성 태그 이름. 빈 문자열이면 출력하지 않음 */
  optionalDependencyTag: string;
  /** 지정 시 메타데이터의 requiresPython 대신 사용 */
  pythonVersion?: string;
  pythonAbiCapability: string;
  versionStyle?: VersionStyle;
  /** python(abi) 버전의 숫자/문자 혼합 로컬 세그먼트를 에러로 처리 */
  strictLocalVersions?: boolean;
}

export interface DependencySet {
  buildRequires: string[];
  requires: string[];
  optional: string[];
}

function globToRegExp(pattern: string): RegExp {
  const body = pattern
    .split('')
    .map((ch) => {
      if (ch === '*') return '.*';
      if (ch === '?') return '.';
      return ch.replace(/[\\^$.|+()[\]{}]/g, '\\$&');
    })
    .join('');
  return new RegExp(`^${body}$`);
}

/**
 * 패턴 중 하나라도 일치하는 extra 목록 (메타데이터 순서 유지)
 *
 * @example
 * matchExtras(['socks', 'security', 'test'], ['s*']) // ['socks', 'security']
 */
export function matchExtras(extras: readonly string[], patterns: readonly string[]): string[] {
  const matchers = patterns.map(globToRegExp);
  return extras.filter((extra) => matchers.some((matcher) => matcher.test(extra)));
}

/**
 * 메타데이터에서 의존성 목록 수집
 */
export function collectDependencies(
  metadata: PackageMetadata,
  options: DependencyTagOptions,
  converter: RequirementConverter
): DependencySet {
  const requiresDist = metadata.requiresDist ?? [];
  const providedExtras = metadata.providesExtra ?? [];

  const requiresExtras = matchExtras(providedExtras, options.requiresExtras);
  const suggestsExtras = matchExtras(providedExtras, options.suggestsExtras);
  logger.debug('extra 선택', { requires: requiresExtras, suggests: suggestsExtras });

  const buildRequires = converter.convert(metadata.buildRequires ?? []);

  const requires = [...options.requires, ...converter.convert(requiresDist, requiresExtras)];
  const pythonVersion = options.pythonVersion ?? metadata.requiresPython;
  if (pythonVersion !== undefined && pythonVersion.trim()) {
    requires.push(
      formatVersionedCapability(options.pythonAbiCapability, pythonVersion, {
        versionStyle: options.versionStyle,
        strictLocal: options.strictLocalVersions,
      })
    );
  }

  const optional = [...options.suggests, ...converter.convert(requiresDist, suggestsExtras)].filter(
    (clause) => !requires.includes(clause)
  );

  return { buildRequires, requires, optional };
}

/**
 * 의존성 태그 라인 생성
 *
 * @example
 * buildDependencyTags({ requiresDist: ['requests>=2'] }, options, converter)
 * // ['Requires: python3-requests >= 2']
 */
export function buildDependencyTags(
  metadata: PackageMetadata,
  options: DependencyTagOptions,
  converter: RequirementConverter
): string[] {
  const { buildRequires, requires, optional } = collectDependencies(metadata, options, converter);
  const lines: string[] = [];

  if (buildRequires.length > 0) {
    lines.push(`BuildRequires: ${buildRequires.join(', ')}`);
  }
  if (requires.length > 0) {
    lines.push(`Requires: ${requires.join(', ')}`);
  }
  if (options.optionalDependencyTag && optional.length > 0) {
    lines.push(`${options.optionalDependencyTag}: ${optional.join(', ')}`);
  }

  return lines;
}
