// 공통 모듈 진입점

// 에러
export * from './errors';

// PEP 440 버전
export {
  tryParseVersion,
  parseVersion,
  isValidVersion,
  formatVersion,
  trimReleaseZeros,
  compareLocalParts,
  comparePep440Versions,
  sortPep440Versions,
  publicVersion,
} from './pep440-version';
export type { Pep440Version, PreRelease, PrePhase, LocalPart } from './pep440-version';

// RPM 버전 비교 및 인코딩
export { rpmvercmp, parseRpmLabel, compareRpmLabels, encodeVersion } from './rpm-version';
export type { RpmLabel, EncodeOptions } from './rpm-version';

// 버전 지정자
export {
  isSpecifierOperator,
  parseSpecifier,
  parseSpecifierSet,
  formatSpecifier,
  compatibleUpperBound,
  specifierContains,
} from './specifier';
export type { SpecifierOperator, VersionSpecifier, SpecifierSet } from './specifier';

// 환경 마커, 요구사항
export { parseMarker, formatMarker } from './marker-parser';
export type { MarkerOperator, MarkerComparison, MarkerBinary, MarkerExpression } from './marker-parser';
export { parseRequirement, normalizeExtraName } from './requirement-parser';
export type { ParsedRequirement } from './requirement-parser';

// 템플릿
export { formatTemplate, templatePlaceholders } from './template';

// 패키지 메타데이터
export { parseMetadataText, metadataFromJson, extrasFromRequirements } from './package-metadata';
export type { PackageMetadata } from './package-metadata';
