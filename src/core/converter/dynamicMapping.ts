/**
 * 설치 시점에만 알 수 있는 마커 변수 → RPM capability 매핑
 *
 * - equality: 값 자체가 capability 이름에 들어감 (==, != 만 가능)
 *   예: platform_machine == "x86_64" -> with python(x86_64)
 * - ordered: 고정 capability에 버전 비교를 붙임
 *   예: platform_release > "3.4" -> with kernel > 3.4
 */

import { ConfigError } from '../shared/errors';
import { templatePlaceholders } from '../shared/template';

export interface EqualityCapability {
  kind: 'equality';
  template: string;
  /** 템플릿의 유일한 자리표시자 이름 */
  parameter: string;
}

export interface OrderedCapability {
  kind: 'ordered';
  capability: string;
}

export type CapabilityDescriptor = EqualityCapability | OrderedCapability;

export type DynamicVariableMapping = ReadonlyMap<string, CapabilityDescriptor>;

// 설정 파일에 적는 형태
export type DynamicVariableConfig =
  | { kind: 'equality'; template: string }
  | { kind: 'ordered'; capability: string };

export const DEFAULT_DYNAMIC_VARIABLES: Readonly<Record<string, DynamicVariableConfig>> = {
  platform_machine: { kind: 'equality', template: 'python({arch})' },
  platform_release: { kind: 'ordered', capability: 'kernel' },
  python_version: { kind: 'ordered', capability: 'python(abi)' },
};

function resolveDescriptor(variable: string, entry: DynamicVariableConfig): CapabilityDescriptor {
  if (entry.kind === 'ordered') {
    if (!entry.capability.trim()) {
      throw new ConfigError(`dynamicVariables.${variable}`, 'capability 이름이 비어 있습니다');
    }
    return { kind: 'ordered', capability: entry.capability.trim() };
  }

  const placeholders = templatePlaceholders(entry.template);
  if (placeholders.length !== 1) {
    throw new ConfigError(
      `dynamicVariables.${variable}`,
      `equality 템플릿에는 자리표시자가 정확히 하나 필요합니다 (${placeholders.length}개): ${entry.template}`
    );
  }
  return { kind: 'equality', template: entry.template, parameter: placeholders[0] };
}

/**
 * 설정 테이블을 한 번에 해석하여 읽기 전용 매핑 생성
 */
export function createDynamicMapping(
  config: Readonly<Record<string, DynamicVariableConfig>> = DEFAULT_DYNAMIC_VARIABLES
): DynamicVariableMapping {
  const mapping = new Map<string, CapabilityDescriptor>();
  for (const [variable, entry] of Object.entries(config)) {
    mapping.set(variable, resolveDescriptor(variable, entry));
  }
  return mapping;
}
