/**
 * Python 배포 메타데이터 로더
 *
 * 두 가지 입력을 받습니다:
 * - core metadata 텍스트 (METADATA / PKG-INFO, RFC 822 헤더)
 * - JSON (camelCase 필드 또는 PyPI JSON API의 info 객체)
 */

import { ConfigError } from './errors';

export interface PackageMetadata {
  name?: string;
  version?: string;
  requiresDist?: string[];
  providesExtra?: string[];
  buildRequires?: string[];
  requiresPython?: string;
}

const EXTRA_MARKER_PATTERN = /\bextra\s*==\s*(['"])([^'"]+)\1/g;

/**
 * requires-dist 마커에서 extra 이름 추출 (Provides-Extra가 없는 메타데이터용)
 */
export function extrasFromRequirements(requirements: readonly string[]): string[] {
  const extras: string[] = [];
  for (const requirement of requirements) {
    for (const match of requirement.matchAll(EXTRA_MARKER_PATTERN)) {
      if (!extras.includes(match[2])) {
        extras.push(match[2]);
      }
    }
  }
  return extras;
}

/**
 * core metadata 헤더 파싱. 첫 빈 줄 이후(본문)는 무시
 *
 * @example
 * parseMetadataText('Name: demo\nRequires-Dist: requests>=2\n')
 * // { name: 'demo', requiresDist: ['requests>=2'], providesExtra: [] }
 */
export function parseMetadataText(text: string): PackageMetadata {
  const metadata: PackageMetadata = {};
  const requiresDist: string[] = [];
  const providesExtra: string[] = [];

  for (const line of text.split(/\r?\n/)) {
    if (!line.trim()) break;
    // 들여쓴 줄은 이전 헤더의 연속 (Description 등)
    if (/^\s/.test(line)) continue;

    const colon = line.indexOf(':');
    if (colon === -1) continue;
    const field = line.slice(0, colon).trim().toLowerCase();
    const value = line.slice(colon + 1).trim();

    switch (field) {
      case 'name':
        metadata.name = value;
        break;
      case 'version':
        metadata.version = value;
        break;
      case 'requires-dist':
        requiresDist.push(value);
        break;
      case 'provides-extra':
        providesExtra.push(value);
        break;
      case 'requires-python':
        metadata.requiresPython = value;
        break;
    }
  }

  metadata.requiresDist = requiresDist;
  metadata.providesExtra = providesExtra.length > 0 ? providesExtra : extrasFromRequirements(requiresDist);
  return metadata;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(source: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === 'string') return value;
  }
  return undefined;
}

function optionalStringArray(source: Record<string, unknown>, ...keys: string[]): string[] | undefined {
  for (const key of keys) {
    const value = source[key];
    if (value === undefined || value === null) continue;
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
      throw new ConfigError(key, '문자열 배열이어야 합니다');
    }
    return [...value];
  }
  return undefined;
}

/**
 * JSON 메타데이터 정규화. PyPI 응답이면 info 객체를 사용
 * @throws ConfigError 필드 타입이 맞지 않는 경우
 */
export function metadataFromJson(raw: unknown): PackageMetadata {
  if (!isRecord(raw)) {
    throw new ConfigError('(metadata)', '메타데이터는 JSON 객체여야 합니다');
  }
  const source = isRecord(raw.info) ? raw.info : raw;

  const requiresDist = optionalStringArray(source, 'requiresDist', 'requires_dist') ?? [];
  const metadata: PackageMetadata = {
    name: optionalString(source, 'name'),
    version: optionalString(source, 'version'),
    requiresDist,
    providesExtra:
      optionalStringArray(source, 'providesExtra', 'provides_extra') ?? extrasFromRequirements(requiresDist),
    buildRequires: optionalStringArray(raw, 'buildRequires', 'build_requires') ?? [],
    requiresPython: optionalString(source, 'requiresPython', 'requires_python'),
  };
  return metadata;
}
