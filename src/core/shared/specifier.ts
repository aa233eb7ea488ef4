/**
 * PEP 440 버전 지정자(specifier) 파서
 *
 * 지원 형식:
 * - >=1.0
 * - >=1.0,<2.0,!=1.5.*
 * - ~=1.4.2
 * - ===foobar
 */

import { InvalidSpecifierOperatorError } from './errors';
import {
  comparePep440Versions,
  parseVersion,
  publicVersion,
  type Pep440Version,
} from './pep440-version';

export type SpecifierOperator = '~=' | '===' | '==' | '!=' | '<=' | '>=' | '<' | '>';

export interface VersionSpecifier {
  operator: SpecifierOperator;
  /** 작성된 그대로의 버전 문자열 (와일드카드 '.*' 제외) */
  version: string;
  /** 끝에 '.*'가 붙은 경우 (==, != 에서만 유효) */
  wildcard: boolean;
}

/** 쉼표로 연결된 지정자 목록 (AND), 선언 순서 유지 */
export type SpecifierSet = VersionSpecifier[];

const SPECIFIER_OPERATORS: readonly SpecifierOperator[] = ['~=', '===', '==', '!=', '<=', '>=', '<', '>'];

const SPECIFIER_PATTERN = /^(~=|===|==|!=|<=|>=|<|>)\s*(\S+)$/;

export function isSpecifierOperator(value: string): value is SpecifierOperator {
  return SPECIFIER_OPERATORS.some((operator) => operator === value);
}

/**
 * 단일 지정자 파싱
 *
 * @example
 * parseSpecifier('== 1.5.*') // { operator: '==', version: '1.5', wildcard: true }
 */
export function parseSpecifier(text: string): VersionSpecifier {
  const trimmed = text.trim();
  const match = SPECIFIER_PATTERN.exec(trimmed);
  const operator = match?.[1] ?? '';
  if (!match || !isSpecifierOperator(operator)) {
    const written = trimmed.match(/^[^\w\s.*]*/)?.[0] ?? '';
    throw new InvalidSpecifierOperatorError(written, '알 수 없는 연산자', trimmed);
  }

  let version = match[2];

  // === 는 임의 문자열 비교이므로 검증하지 않음
  if (operator === '===') {
    return { operator, version, wildcard: false };
  }

  const wildcard = version.endsWith('.*');
  if (wildcard) {
    if (operator !== '==' && operator !== '!=') {
      throw new InvalidSpecifierOperatorError(operator, "와일드카드 '.*'는 == 또는 != 에서만 사용 가능", trimmed);
    }
    version = version.slice(0, -2);
  }

  const parsed = parseVersion(version);
  if (operator === '~=') {
    compatibleUpperBound(parsed, trimmed);
  }

  return { operator, version, wildcard };
}

/**
 * 쉼표로 구분된 지정자 목록 파싱 (빈 문자열은 빈 목록)
 */
export function parseSpecifierSet(text: string): SpecifierSet {
  return text
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => parseSpecifier(part));
}

export function formatSpecifier(specifier: VersionSpecifier): string {
  return `${specifier.operator}${specifier.version}${specifier.wildcard ? '.*' : ''}`;
}

/**
 * ~= 의 상한 릴리스: 마지막 세그먼트를 버리고 새 마지막 세그먼트를 1 증가
 *
 * @example
 * compatibleUpperBound(parseVersion('1.5.3b7')) // [1n, 6n]
 * compatibleUpperBound(parseVersion('5.0')) // [6n]
 * @throws InvalidSpecifierOperatorError 릴리스 세그먼트가 2개 미만인 경우
 */
export function compatibleUpperBound(version: Pep440Version, input?: string): bigint[] {
  if (version.release.length < 2) {
    throw new InvalidSpecifierOperatorError('~=', '릴리스 세그먼트가 2개 이상 필요', input);
  }
  const upper = version.release.slice(0, -1);
  upper[upper.length - 1] += 1n;
  return upper;
}

function isPreRelease(version: Pep440Version): boolean {
  return version.pre !== undefined || version.dev !== undefined;
}

function isPostRelease(version: Pep440Version): boolean {
  return version.post !== undefined;
}

// epoch와 릴리스만 비교 (1.0rc1, 1.0.post2, 1.0+abc 모두 1.0과 같음)
function sameBaseVersion(a: Pep440Version, b: Pep440Version): boolean {
  return comparePep440Versions({ epoch: a.epoch, release: a.release }, { epoch: b.epoch, release: b.release }) === 0;
}

function matchesReleasePrefix(candidate: Pep440Version, prefix: Pep440Version): boolean {
  if (candidate.epoch !== prefix.epoch) return false;
  return prefix.release.every((segment, i) => (candidate.release[i] ?? 0n) === segment);
}

/**
 * 후보 버전이 지정자를 만족하는지 확인
 */
export function specifierContains(specifier: VersionSpecifier, candidateText: string): boolean {
  if (specifier.operator === '===') {
    return candidateText.trim().toLowerCase() === specifier.version.toLowerCase();
  }

  const candidate = parseVersion(candidateText);
  const target = parseVersion(specifier.version);

  switch (specifier.operator) {
    case '==':
    case '!=': {
      let equal: boolean;
      if (specifier.wildcard) {
        equal = matchesReleasePrefix(candidate, target);
      } else {
        // 지정자에 로컬 세그먼트가 없으면 후보의 로컬 세그먼트는 무시
        const comparable = target.local ? candidate : publicVersion(candidate);
        equal = comparePep440Versions(comparable, target) === 0;
      }
      return specifier.operator === '==' ? equal : !equal;
    }
    case '<':
      // <V 는 V 자체의 pre-release를 포함하지 않음 (V가 pre-release인 경우 제외)
      if (!isPreRelease(target) && isPreRelease(candidate) && sameBaseVersion(candidate, target)) {
        return false;
      }
      return comparePep440Versions(candidate, target) < 0;
    case '<=':
      return comparePep440Versions(publicVersion(candidate), target) <= 0;
    case '>':
      // >V 는 V의 post-release와 로컬 버전을 포함하지 않음
      if (!isPostRelease(target) && isPostRelease(candidate) && sameBaseVersion(candidate, target)) {
        return false;
      }
      if (candidate.local && sameBaseVersion(candidate, target)) {
        return false;
      }
      return comparePep440Versions(candidate, target) > 0;
    case '>=':
      return comparePep440Versions(publicVersion(candidate), target) >= 0;
    case '~=': {
      const prefix: Pep440Version = { epoch: target.epoch, release: target.release.slice(0, -1) };
      compatibleUpperBound(target, formatSpecifier(specifier));
      return comparePep440Versions(candidate, target) >= 0 && matchesReleasePrefix(candidate, prefix);
    }
  }
}
