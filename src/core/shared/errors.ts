/**
 * 변환 엔진 에러 타입
 *
 * 모든 에러는 동기적으로 던져지며 엔진 내부에서 잡지 않습니다.
 * 요구사항 단위로 무시할지, 전체 변환을 중단할지는 호출자가 결정합니다.
 */

/**
 * 에러 코드
 */
export type ConversionErrorCode =
  | 'EVERSION' // PEP 440 버전 파싱 실패
  | 'EMARKERVAR' // 알 수 없는 마커 변수
  | 'EOPERATOR' // 지원하지 않는 연산자 (또는 단일 세그먼트 ~=)
  | 'ELOCAL' // RPM으로 안전하게 인코딩할 수 없는 로컬 버전
  | 'EMARKER' // 마커 문법 오류
  | 'EREQUIREMENT' // 요구사항 문법 오류
  | 'ETEMPLATE' // capability 템플릿 오류
  | 'ECONFIG'; // 설정 오류

export interface ConversionErrorContext {
  input?: string;
  variable?: string;
  operator?: string;
  position?: number;
  key?: string;
}

export class ConversionError extends Error {
  readonly code: ConversionErrorCode;
  readonly context?: ConversionErrorContext;

  constructor(code: ConversionErrorCode, message: string, context?: ConversionErrorContext) {
    super(message);
    this.name = 'ConversionError';
    this.code = code;
    this.context = context;

    // instanceof 체크를 위한 프로토타입 체인 복구
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class MalformedVersionError extends ConversionError {
  constructor(version: string) {
    super('EVERSION', `잘못된 PEP 440 버전: '${version}'`, { input: version });
    this.name = 'MalformedVersionError';
  }
}

export class UnsupportedMarkerVariableError extends ConversionError {
  constructor(variable: string) {
    super('EMARKERVAR', `지원하지 않는 마커 변수: ${variable}`, { variable });
    this.name = 'UnsupportedMarkerVariableError';
  }
}

export class InvalidSpecifierOperatorError extends ConversionError {
  constructor(operator: string, detail: string, input?: string) {
    super('EOPERATOR', `잘못된 연산자 '${operator}': ${detail}`, { operator, input });
    this.name = 'InvalidSpecifierOperatorError';
  }
}

export class InconsistentLocalSegmentError extends ConversionError {
  constructor(version: string, segment: string) {
    super(
      'ELOCAL',
      `로컬 버전 세그먼트 '${segment}'는 RPM 순서로 안전하게 인코딩할 수 없습니다: ${version}`,
      { input: version }
    );
    this.name = 'InconsistentLocalSegmentError';
  }
}

export class InvalidMarkerError extends ConversionError {
  constructor(marker: string, detail: string, position?: number) {
    super('EMARKER', `잘못된 환경 마커 (${detail}): ${marker}`, { input: marker, position });
    this.name = 'InvalidMarkerError';
  }
}

export class InvalidRequirementError extends ConversionError {
  constructor(requirement: string, detail: string) {
    super('EREQUIREMENT', `잘못된 요구사항 (${detail}): ${requirement}`, { input: requirement });
    this.name = 'InvalidRequirementError';
  }
}

export class TemplateError extends ConversionError {
  constructor(template: string, detail: string, key?: string) {
    super('ETEMPLATE', `템플릿 오류 (${detail}): ${template}`, { input: template, key });
    this.name = 'TemplateError';
  }
}

export class ConfigError extends ConversionError {
  constructor(key: string, detail: string) {
    super('ECONFIG', `설정 오류 '${key}': ${detail}`, { key });
    this.name = 'ConfigError';
  }
}

/**
 * 엔진 에러 여부 확인
 */
export function isConversionError(error: unknown): error is ConversionError {
  return error instanceof ConversionError;
}
