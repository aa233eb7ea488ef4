/**
 * RPM 버전 비교 및 PEP 440 → RPM 버전 인코딩
 *
 * rpmvercmp 규칙:
 * - 영숫자가 아닌 문자는 구분자 (~, ^ 제외)
 * - 숫자 세그먼트 > 문자 세그먼트, 숫자는 수치 비교, 문자는 사전순
 * - ~ 는 문자열 끝을 포함한 모든 것보다 작음
 * - ^ 는 문자열 끝보다 크고 그 외 모든 것보다 작음
 */

import { InconsistentLocalSegmentError } from './errors';
import { formatVersion, parseVersion, trimReleaseZeros, type Pep440Version } from './pep440-version';

export interface EncodeOptions {
  /** 숫자와 문자가 섞인 로컬 세그먼트를 에러로 처리 (기본값: false) */
  strictLocal?: boolean;
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isAlpha(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

function isAlnum(ch: string): boolean {
  return isDigit(ch) || isAlpha(ch);
}

/**
 * RPM 레이블 세그먼트 비교 (rpmvercmp)
 *
 * @returns a > b면 1, a < b면 -1, 같으면 0
 */
export function rpmvercmp(a: string, b: string): number {
  if (a === b) return 0;

  let i = 0;
  let j = 0;

  while (i < a.length || j < b.length) {
    while (i < a.length && !isAlnum(a[i]) && a[i] !== '~' && a[i] !== '^') i++;
    while (j < b.length && !isAlnum(b[j]) && b[j] !== '~' && b[j] !== '^') j++;

    const chA = a.charAt(i);
    const chB = b.charAt(j);

    if (chA === '~' || chB === '~') {
      if (chA !== '~') return 1;
      if (chB !== '~') return -1;
      i++;
      j++;
      continue;
    }

    if (chA === '^' || chB === '^') {
      if (i >= a.length) return -1;
      if (j >= b.length) return 1;
      if (chA !== '^') return 1;
      if (chB !== '^') return -1;
      i++;
      j++;
      continue;
    }

    if (i >= a.length || j >= b.length) break;

    const startA = i;
    const startB = j;
    const numeric = isDigit(chA);
    const inSegment = numeric ? isDigit : isAlpha;

    while (i < a.length && inSegment(a[i])) i++;
    while (j < b.length && inSegment(b[j])) j++;

    // 세그먼트 타입이 다르면 숫자 쪽이 큼
    if (j === startB) return numeric ? 1 : -1;

    let segA = a.slice(startA, i);
    let segB = b.slice(startB, j);

    if (numeric) {
      segA = segA.replace(/^0+/, '');
      segB = segB.replace(/^0+/, '');
      if (segA.length !== segB.length) return segA.length > segB.length ? 1 : -1;
    }

    if (segA !== segB) return segA < segB ? -1 : 1;
  }

  if (i >= a.length && j >= b.length) return 0;
  return i >= a.length ? -1 : 1;
}

export interface RpmLabel {
  epoch: bigint;
  version: string;
  release?: string;
}

/**
 * [epoch:]version[-release] 파싱
 */
export function parseRpmLabel(label: string): RpmLabel {
  let rest = label.trim();
  let epoch = 0n;

  const epochMatch = rest.match(/^(\d+):/);
  if (epochMatch) {
    epoch = BigInt(epochMatch[1]);
    rest = rest.substring(epochMatch[0].length);
  }

  const dash = rest.lastIndexOf('-');
  if (dash === -1) {
    return { epoch, version: rest };
  }
  return { epoch, version: rest.substring(0, dash), release: rest.substring(dash + 1) };
}

/**
 * RPM EVR 비교 (epoch, version, release 순)
 * release는 양쪽 모두 있을 때만 비교
 */
export function compareRpmLabels(a: string, b: string): number {
  const labelA = parseRpmLabel(a);
  const labelB = parseRpmLabel(b);

  if (labelA.epoch !== labelB.epoch) return labelA.epoch > labelB.epoch ? 1 : -1;

  const versionCmp = rpmvercmp(labelA.version, labelB.version);
  if (versionCmp !== 0) return versionCmp;

  if (labelA.release === undefined || labelB.release === undefined) return 0;
  return rpmvercmp(labelA.release, labelB.release);
}

/**
 * 릴리스 세그먼트 정규화: 뒤쪽 0을 지우되 최소 두 자리는 유지
 * PEP 440에서 같은 1, 1.0, 1.0.0이 RPM에서도 같게 비교되도록 함
 */
function encodeRelease(release: readonly bigint[]): string {
  const trimmed = trimReleaseZeros(release, 2);
  while (trimmed.length < 2) {
    trimmed.push(0n);
  }
  return trimmed.join('.');
}

// 로컬 세그먼트는 ^ 뒤에 붙임. 숫자/문자 혼합 세그먼트는 RPM이 다르게 쪼개므로 순서가 정확하지 않음
function encodeLocal(text: string, version: Pep440Version, strict: boolean): string {
  const parts = version.local ?? [];
  if (strict) {
    const mixed = parts.find((part) => typeof part === 'string' && /\d/.test(part));
    if (mixed !== undefined) {
      throw new InconsistentLocalSegmentError(text, String(mixed));
    }
  }
  return parts.join('.');
}

/**
 * PEP 440 버전을 RPM 비교 순서가 보존되는 레이블로 인코딩
 *
 * @example
 * encodeVersion('1.0a1') // '1.0~a1'
 * encodeVersion('1.0.dev1') // '1.0~~dev1'
 * encodeVersion('1!2.0.post1') // '1:2.0.post1'
 * encodeVersion('1.0+ubuntu-1') // '1.0^ubuntu.1'
 */
export function encodeVersion(input: string | Pep440Version, options: EncodeOptions = {}): string {
  const version = typeof input === 'string' ? parseVersion(input) : input;
  const hasPost = version.post !== undefined;

  let label = version.epoch !== 0n ? `${version.epoch}:` : '';
  label += encodeRelease(version.release);

  if (version.pre) {
    label += `~${version.pre.phase}${version.pre.number}`;
  } else if (version.dev !== undefined && !hasPost) {
    // dev 전용 버전은 모든 pre-release(~a, ~b, ~rc)보다 앞서야 함
    label += `~~dev${version.dev}`;
  }

  if (hasPost) {
    label += `.post${version.post}`;
  }

  if (version.dev !== undefined && (version.pre || hasPost)) {
    label += `~dev${version.dev}`;
  }

  if (version.local) {
    const text = typeof input === 'string' ? input : formatVersion(version);
    label += `^${encodeLocal(text, version, options.strictLocal ?? false)}`;
  }

  return label;
}
