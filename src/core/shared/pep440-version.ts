/**
 * PEP 440 버전 파서 및 비교
 *
 * PEP 공식 문서 기반 구현:
 * https://peps.python.org/pep-0440/
 *
 * 버전 순서 (같은 릴리스 기준):
 * - X.devN < X.aN.devM < X.aN < X.aN.postM < X.bN < X.rcN < X < X.postN.devM < X.postN
 * - 로컬 버전이 붙으면 같은 공개 버전보다 큼
 */

import { MalformedVersionError } from './errors';

export type PrePhase = 'a' | 'b' | 'rc';

export type LocalPart = bigint | string;

export interface PreRelease {
  phase: PrePhase;
  number: bigint;
}

/**
 * 파싱된 PEP 440 버전
 *
 * 숫자 세그먼트는 크기 제한이 없으므로 bigint로 보관합니다.
 */
export interface Pep440Version {
  epoch: bigint;
  release: bigint[];
  pre?: PreRelease;
  post?: bigint;
  dev?: bigint;
  local?: LocalPart[];
}

// packaging 라이브러리의 VERSION_PATTERN과 동일한 문법
const VERSION_PATTERN = new RegExp(
  '^v?' +
    '(?:(?<epoch>[0-9]+)!)?' +
    '(?<release>[0-9]+(?:\\.[0-9]+)*)' +
    '(?<pre>[-_.]?(?<preL>alpha|a|beta|b|preview|pre|c|rc)[-_.]?(?<preN>[0-9]+)?)?' +
    '(?<post>(?:-(?<postN1>[0-9]+))|(?:[-_.]?(?<postL>post|rev|r)[-_.]?(?<postN2>[0-9]+)?))?' +
    '(?<dev>[-_.]?(?<devL>dev)[-_.]?(?<devN>[0-9]+)?)?' +
    '(?:\\+(?<local>[a-z0-9]+(?:[-_.][a-z0-9]+)*))?$',
  'i'
);

const PRE_PHASE_ALIASES: Record<string, PrePhase> = {
  a: 'a',
  alpha: 'a',
  b: 'b',
  beta: 'b',
  c: 'rc',
  rc: 'rc',
  pre: 'rc',
  preview: 'rc',
};

const PRE_PHASE_ORDER: Record<PrePhase, number> = { a: 0, b: 1, rc: 2 };

/**
 * 버전 문자열 파싱 (실패 시 null)
 */
export function tryParseVersion(text: string): Pep440Version | null {
  const match = VERSION_PATTERN.exec(text.trim());
  if (!match) return null;

  const group = (name: string): string | undefined => match.groups?.[name];

  const version: Pep440Version = {
    epoch: BigInt(group('epoch') ?? '0'),
    release: (group('release') ?? '0').split('.').map((part) => BigInt(part)),
  };

  const preLabel = group('preL');
  if (preLabel !== undefined) {
    version.pre = {
      phase: PRE_PHASE_ALIASES[preLabel.toLowerCase()],
      number: BigInt(group('preN') ?? '0'),
    };
  }

  // 암시적 post (1.0-1) 또는 명시적 post/rev/r
  const implicitPost = group('postN1');
  if (implicitPost !== undefined) {
    version.post = BigInt(implicitPost);
  } else if (group('postL') !== undefined) {
    version.post = BigInt(group('postN2') ?? '0');
  }

  if (group('devL') !== undefined) {
    version.dev = BigInt(group('devN') ?? '0');
  }

  const local = group('local');
  if (local !== undefined) {
    version.local = local
      .toLowerCase()
      .split(/[-_.]/)
      .map((part) => (/^\d+$/.test(part) ? BigInt(part) : part));
  }

  return version;
}

/**
 * 버전 문자열 파싱
 * @throws MalformedVersionError PEP 440 형식이 아닌 경우
 */
export function parseVersion(text: string): Pep440Version {
  const version = tryParseVersion(text);
  if (!version) {
    throw new MalformedVersionError(text);
  }
  return version;
}

export function isValidVersion(text: string): boolean {
  return tryParseVersion(text) !== null;
}

/**
 * 정규화된 PEP 440 문자열
 *
 * @example
 * formatVersion(parseVersion('1.0-ALPHA.1')) // '1.0a1'
 * formatVersion(parseVersion('v2!1.0-r')) // '2!1.0.post0'
 */
export function formatVersion(version: Pep440Version): string {
  let text = version.epoch !== 0n ? `${version.epoch}!` : '';
  text += version.release.join('.');
  if (version.pre) text += `${version.pre.phase}${version.pre.number}`;
  if (version.post !== undefined) text += `.post${version.post}`;
  if (version.dev !== undefined) text += `.dev${version.dev}`;
  if (version.local) text += `+${version.local.join('.')}`;
  return text;
}

/**
 * 뒤쪽 0 세그먼트 제거 (1.0.0 == 1.0 == 1)
 */
export function trimReleaseZeros(release: readonly bigint[], minLength = 1): bigint[] {
  let end = release.length;
  while (end > minLength && release[end - 1] === 0n) {
    end--;
  }
  return release.slice(0, end);
}

function compareBigInt(a: bigint, b: bigint): number {
  return a === b ? 0 : a < b ? -1 : 1;
}

function compareBigIntArrays(a: readonly bigint[], b: readonly bigint[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) return compareBigInt(a[i], b[i]);
  }
  return a.length - b.length;
}

function sign(value: number): number {
  return value === 0 ? 0 : value < 0 ? -1 : 1;
}

// pre 키: dev 전용 버전은 모든 pre보다 작고, pre가 없는 버전은 모든 pre보다 큼
function compareByPre(a: Pep440Version, b: Pep440Version): number {
  const rank = (v: Pep440Version): number => {
    if (v.pre) return 1;
    if (v.post === undefined && v.dev !== undefined) return 0;
    return 2;
  };

  const rankDiff = rank(a) - rank(b);
  if (rankDiff !== 0) return rankDiff;
  if (!a.pre || !b.pre) return 0;

  const phaseDiff = PRE_PHASE_ORDER[a.pre.phase] - PRE_PHASE_ORDER[b.pre.phase];
  return phaseDiff !== 0 ? phaseDiff : compareBigInt(a.pre.number, b.pre.number);
}

function compareByPost(a: Pep440Version, b: Pep440Version): number {
  if (a.post === undefined || b.post === undefined) {
    return (a.post === undefined ? 0 : 1) - (b.post === undefined ? 0 : 1);
  }
  return compareBigInt(a.post, b.post);
}

function compareByDev(a: Pep440Version, b: Pep440Version): number {
  if (a.dev === undefined || b.dev === undefined) {
    // dev가 없는 쪽이 더 큼
    return (a.dev === undefined ? 1 : 0) - (b.dev === undefined ? 1 : 0);
  }
  return compareBigInt(a.dev, b.dev);
}

/**
 * 로컬 세그먼트 비교: 숫자 > 문자열, 접두사가 같으면 긴 쪽이 큼
 */
export function compareLocalParts(a: LocalPart[], b: LocalPart[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const partA = a[i];
    const partB = b[i];
    if (typeof partA === 'bigint' && typeof partB === 'bigint') {
      if (partA !== partB) return compareBigInt(partA, partB);
    } else if (typeof partA === 'bigint') {
      return 1;
    } else if (typeof partB === 'bigint') {
      return -1;
    } else if (partA !== partB) {
      return partA < partB ? -1 : 1;
    }
  }
  return a.length - b.length;
}

function compareByLocal(a: Pep440Version, b: Pep440Version): number {
  if (!a.local || !b.local) {
    return (a.local ? 1 : 0) - (b.local ? 1 : 0);
  }
  return compareLocalParts(a.local, b.local);
}

function toVersion(value: Pep440Version | string): Pep440Version {
  return typeof value === 'string' ? parseVersion(value) : value;
}

/**
 * PEP 440 버전 비교
 *
 * @returns a > b면 양수, a < b면 음수, 같으면 0 (항상 -1, 0, 1 중 하나)
 */
export function comparePep440Versions(
  a: Pep440Version | string,
  b: Pep440Version | string
): number {
  const va = toVersion(a);
  const vb = toVersion(b);

  if (va.epoch !== vb.epoch) return compareBigInt(va.epoch, vb.epoch);

  const releaseCmp = compareBigIntArrays(trimReleaseZeros(va.release), trimReleaseZeros(vb.release));
  if (releaseCmp !== 0) return sign(releaseCmp);

  for (const compare of [compareByPre, compareByPost, compareByDev, compareByLocal]) {
    const result = compare(va, vb);
    if (result !== 0) return sign(result);
  }
  return 0;
}

/**
 * 버전 배열을 PEP 440 오름차순으로 정렬
 */
export function sortPep440Versions(versions: string[]): string[] {
  return [...versions].sort((a, b) => comparePep440Versions(a, b));
}

/**
 * 로컬 세그먼트를 뗀 공개 버전
 */
export function publicVersion(version: Pep440Version): Pep440Version {
  const { local: _local, ...rest } = version;
  return rest;
}
