/**
 * PEP 508 요구사항 문자열 파서
 * 예: "requests>=2.20.0", "urllib3[socks] (>=1.21.1,<1.27) ; python_version < '3.8'"
 */

import { InvalidRequirementError } from './errors';
import { parseMarker, type MarkerExpression } from './marker-parser';
import { parseSpecifierSet, type SpecifierSet } from './specifier';

export interface ParsedRequirement {
  name: string;
  extras: string[];
  specifiers: SpecifierSet;
  url?: string;
  marker?: MarkerExpression;
  /** 원본 마커 문자열 (로그용) */
  markerText?: string;
}

const NAME_PATTERN = /^([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)/;
const EXTRA_PATTERN = /^[A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?$/;

/**
 * extra 이름 정규화 (PEP 685)
 * 예: "Socks_Proxy" -> "socks-proxy"
 */
export function normalizeExtraName(name: string): string {
  return name.trim().toLowerCase().replace(/[-_.]+/g, '-');
}

function parseExtras(requirement: string, text: string): string[] {
  const inner = text.trim();
  if (!inner) return [];

  return inner.split(',').map((extra) => {
    const trimmed = extra.trim();
    if (!EXTRA_PATTERN.test(trimmed)) {
      throw new InvalidRequirementError(requirement, `잘못된 extra 이름 '${trimmed}'`);
    }
    return trimmed;
  });
}

function parseVersionPart(requirement: string, text: string): SpecifierSet {
  let spec = text.trim();
  if (spec.startsWith('(')) {
    if (!spec.endsWith(')')) {
      throw new InvalidRequirementError(requirement, "')'가 필요합니다");
    }
    spec = spec.slice(1, -1);
  }
  return parseSpecifierSet(spec);
}

/**
 * 요구사항 문자열 파싱
 *
 * @throws InvalidRequirementError 이름/extras/URL 문법 오류
 * @throws InvalidSpecifierOperatorError, MalformedVersionError 버전 지정자 오류
 * @throws InvalidMarkerError 마커 문법 오류
 */
export function parseRequirement(requirement: string): ParsedRequirement {
  const text = requirement.trim();
  const nameMatch = NAME_PATTERN.exec(text);
  if (!nameMatch) {
    throw new InvalidRequirementError(requirement, '패키지명이 필요합니다');
  }

  const result: ParsedRequirement = { name: nameMatch[1], extras: [], specifiers: [] };
  let rest = text.slice(nameMatch[0].length).trimStart();

  // extras 추출 ([...] 부분)
  if (rest.startsWith('[')) {
    const close = rest.indexOf(']');
    if (close === -1) {
      throw new InvalidRequirementError(requirement, "']'가 필요합니다");
    }
    result.extras = parseExtras(requirement, rest.slice(1, close));
    rest = rest.slice(close + 1).trimStart();
  }

  let markerText: string | undefined;

  if (rest.startsWith('@')) {
    // URL 요구사항: URL 뒤의 마커는 공백으로 구분되어야 함
    const urlPart = rest.slice(1).trimStart();
    const urlMatch = /^\S+/.exec(urlPart);
    if (!urlMatch) {
      throw new InvalidRequirementError(requirement, 'URL이 필요합니다');
    }
    result.url = urlMatch[0];

    const after = urlPart.slice(urlMatch[0].length).trim();
    if (after) {
      if (!after.startsWith(';')) {
        throw new InvalidRequirementError(requirement, `URL 뒤에 예상치 못한 내용 '${after}'`);
      }
      markerText = after.slice(1);
    }
  } else {
    // 환경 마커 분리 (;로 구분)
    const semicolon = rest.indexOf(';');
    const versionPart = semicolon === -1 ? rest : rest.slice(0, semicolon);
    if (semicolon !== -1) {
      markerText = rest.slice(semicolon + 1);
    }
    result.specifiers = parseVersionPart(requirement, versionPart);
  }

  if (markerText !== undefined) {
    const trimmed = markerText.trim();
    if (!trimmed) {
      throw new InvalidRequirementError(requirement, "';' 뒤에 마커가 없습니다");
    }
    result.marker = parseMarker(trimmed);
    result.markerText = trimmed;
  }

  return result;
}
