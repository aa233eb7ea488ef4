import logger from '../../utils/logger';
import type { Config } from '../config';
import { formatMarker } from '../shared/marker-parser';
import { parseRequirement } from '../shared/requirement-parser';
import { formatTemplate } from '../shared/template';
import { createDynamicMapping, type DynamicVariableMapping } from './dynamicMapping';
import {
  evaluateMarker,
  TRUE_RESULT,
  type ExtrasInput,
  type MarkerEnvironment,
} from './markerEvaluator';
import { formatVersionedCapability, type VersionStyle } from './specifierTranslator';

export interface RequirementConverterOptions {
  /** 변환 시점에 확정된 마커 변수 값 */
  environment: MarkerEnvironment;
  /** 설치 시점 변수 매핑 (기본값: platform_machine, platform_release, python_version) */
  dynamicMapping?: DynamicVariableMapping;
  /** 패키지 capability 템플릿, {name} 자리표시자 (예: 'python3-{name}') */
  packageTemplate: string;
  versionStyle?: VersionStyle;
  strictLocalVersions?: boolean;
}

/**
 * Python 요구사항 → RPM 의존성 절 변환기
 *
 * 요구사항 하나당 절 하나(쉼표로 연결된 버전 절 포함)를 만들거나, 마커가
 * 정적으로 거짓이면 건너뜁니다. 출력 순서는 입력 순서와 같습니다.
 */
export class RequirementConverter {
  private readonly environment: MarkerEnvironment;
  private readonly dynamicMapping: DynamicVariableMapping;
  private readonly packageTemplate: string;
  private readonly versionStyle: VersionStyle;
  private readonly strictLocalVersions: boolean;

  constructor(options: RequirementConverterOptions) {
    this.environment = { ...options.environment };
    this.dynamicMapping = options.dynamicMapping ?? createDynamicMapping();
    this.packageTemplate = options.packageTemplate;
    this.versionStyle = options.versionStyle ?? 'literal';
    this.strictLocalVersions = options.strictLocalVersions ?? false;
  }

  /**
   * 패키지명을 capability 이름으로 변환
   */
  capabilityName(packageName: string): string {
    return formatTemplate(this.packageTemplate, { name: packageName });
  }

  /**
   * 요구사항 하나 변환. 마커가 거짓이면 null
   */
  convertOne(requirement: string, activeExtras: ExtrasInput = []): string | null {
    const parsed = parseRequirement(requirement);

    const condition = parsed.marker
      ? evaluateMarker(parsed.marker, this.environment, activeExtras, this.dynamicMapping)
      : TRUE_RESULT;

    if (condition.kind === 'boolean' && !condition.value) {
      logger.debug('마커 조건 불일치로 의존성 제외', {
        requirement: parsed.name,
        marker: parsed.marker ? formatMarker(parsed.marker) : undefined,
      });
      return null;
    }

    const capability = formatVersionedCapability(this.capabilityName(parsed.name), parsed.specifiers, {
      versionStyle: this.versionStyle,
      strictLocal: this.strictLocalVersions,
    });

    if (condition.kind === 'boolean') {
      return capability;
    }

    logger.debug('설치 시점 조건부 의존성', { requirement: parsed.name, condition: condition.text });
    return `(${capability} ${condition.text})`;
  }

  /**
   * 요구사항 목록 변환 (입력 순서 유지, 거짓 마커는 제외)
   */
  convert(requirements: readonly string[], activeExtras: ExtrasInput = []): string[] {
    // Iterable은 한 번만 순회할 수 있으므로 배열로 고정
    const extras = [...activeExtras];
    const clauses: string[] = [];
    for (const requirement of requirements) {
      const clause = this.convertOne(requirement, extras);
      if (clause !== null) {
        clauses.push(clause);
      }
    }
    return clauses;
  }
}

/**
 * 설정으로부터 변환기 생성 (동적 변수 매핑은 이 시점에 한 번만 해석)
 * @throws ConfigError 잘못된 dynamicVariables 항목
 */
export function createRequirementConverter(config: Config): RequirementConverter {
  return new RequirementConverter({
    environment: config.environment,
    dynamicMapping: createDynamicMapping(config.dynamicVariables),
    packageTemplate: config.packageTemplate,
    versionStyle: config.versionStyle,
    strictLocalVersions: config.strictLocalVersions,
  });
}
