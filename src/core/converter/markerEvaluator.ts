/**
 * 환경 마커 평가기
 *
 * 변환 시점에 알 수 있는 값(OS, 인터프리터 구현, 활성 extras)은 즉시 true/false로
 * 평가하고, 설치 대상 머신에서만 알 수 있는 값(CPU 아키텍처, 커널, Python ABI)은
 * RPM 조건부 의존성(with/without) 문자열로 미룹니다.
 *
 * and/or는 3값 논리로 단락 평가합니다:
 *   and: (F,_)->F  (_,F)->F  (T,x)->x  (x,T)->x  (c1,c2)->"c1 c2"
 *   or:  (T,_)->T  (_,T)->T  (F,x)->x  (x,F)->x  (c1,c2)->"c1 or c2"
 */

import {
  InvalidSpecifierOperatorError,
  UnsupportedMarkerVariableError,
} from '../shared/errors';
import {
  formatMarker,
  parseMarker,
  type MarkerComparison,
  type MarkerExpression,
  type MarkerOperator,
} from '../shared/marker-parser';
import { formatVersion, isValidVersion, parseVersion } from '../shared/pep440-version';
import { normalizeExtraName } from '../shared/requirement-parser';
import { compatibleUpperBound, specifierContains } from '../shared/specifier';
import { formatTemplate } from '../shared/template';
import type {
  DynamicVariableMapping,
  EqualityCapability,
  OrderedCapability,
} from './dynamicMapping';

/**
 * 평가 결과: 정적으로 확정된 불리언 또는 설치 시점 조건 문자열
 */
export type TranslationResult =
  | { kind: 'boolean'; value: boolean }
  | { kind: 'condition'; text: string };

export const TRUE_RESULT: TranslationResult = { kind: 'boolean', value: true };
export const FALSE_RESULT: TranslationResult = { kind: 'boolean', value: false };

/** 변환 시점에 값이 확정된 마커 변수 */
export type MarkerEnvironment = Readonly<Record<string, string>>;

export type ExtrasInput = Iterable<string>;

function booleanResult(value: boolean): TranslationResult {
  return value ? TRUE_RESULT : FALSE_RESULT;
}

function conditionResult(text: string): TranslationResult {
  return { kind: 'condition', text };
}

// 변수가 오른쪽에 있던 비교를 "변수 OP 리터럴" 형태로 뒤집을 때의 연산자
const MIRRORED_OPERATORS: Partial<Record<MarkerOperator, MarkerOperator>> = {
  '<': '>',
  '<=': '>=',
  '>': '<',
  '>=': '<=',
  '==': '==',
  '!=': '!=',
  '===': '===',
};

/**
 * in / not in 의 오른쪽 값을 토큰 집합으로 분리 (공백 또는 쉼표 구분)
 */
function tokenSet(text: string): string[] {
  return text.split(/[\s,]+/).filter((token) => token.length > 0);
}

function compareKnown(lhs: string, operator: MarkerOperator, rhs: string): boolean {
  switch (operator) {
    case 'in':
      return tokenSet(rhs).includes(lhs);
    case 'not in':
      return !tokenSet(rhs).includes(lhs);
    case '===':
      return lhs === rhs;
    case '==':
    case '!=': {
      const wildcard = rhs.endsWith('.*');
      if (wildcard && isValidVersion(lhs) && isValidVersion(rhs.slice(0, -2))) {
        return specifierContains({ operator, version: rhs.slice(0, -2), wildcard }, lhs);
      }
      return operator === '==' ? lhs === rhs : lhs !== rhs;
    }
  }

  // 순서 비교: 양쪽이 PEP 440 버전이면 버전 비교, 아니면 문자열 비교
  if (isValidVersion(lhs) && isValidVersion(rhs)) {
    if (operator === '~=') {
      compatibleUpperBound(parseVersion(rhs), `${operator}${rhs}`);
    }
    return specifierContains({ operator, version: rhs, wildcard: false }, lhs);
  }

  switch (operator) {
    case '<':
      return lhs < rhs;
    case '<=':
      return lhs <= rhs;
    case '>':
      return lhs > rhs;
    case '>=':
      return lhs >= rhs;
    case '~=':
      throw new InvalidSpecifierOperatorError(operator, `버전이 아닌 값에는 사용할 수 없습니다: ${lhs} ~= ${rhs}`);
  }
}

function evaluateExtra(leaf: MarkerComparison, extras: ReadonlySet<string>): boolean {
  const literal = normalizeExtraName(leaf.literal);

  switch (leaf.operator) {
    case '==':
    case '===':
      return extras.has(literal);
    case '!=':
      return !extras.has(literal);
    case 'in':
    case 'not in': {
      // extra in "a, b": 활성 extra 중 하나라도 집합에 있으면 참
      // "a" in extra: 리터럴이 활성 extra 중 하나면 참
      const found = leaf.reversed
        ? extras.has(literal)
        : tokenSet(leaf.literal).some((token) => extras.has(normalizeExtraName(token)));
      return leaf.operator === 'in' ? found : !found;
    }
    default:
      throw new InvalidSpecifierOperatorError(leaf.operator, 'extra 마커는 ==, !=, in, not in 만 지원합니다');
  }
}

function evaluateEqualityCapability(
  leaf: MarkerComparison,
  operator: MarkerOperator,
  descriptor: EqualityCapability
): TranslationResult {
  const capability = (value: string): string => formatTemplate(descriptor.template, { [descriptor.parameter]: value });

  switch (operator) {
    case '==':
    case '===':
      return conditionResult(`with ${capability(leaf.literal)}`);
    case '!=':
      return conditionResult(`without ${capability(leaf.literal)}`);
    case 'in': {
      const tokens = tokenSet(leaf.literal);
      if (tokens.length === 0) return FALSE_RESULT;
      return conditionResult(tokens.map((token) => `with ${capability(token)}`).join(' or '));
    }
    case 'not in': {
      const tokens = tokenSet(leaf.literal);
      if (tokens.length === 0) return TRUE_RESULT;
      return conditionResult(tokens.map((token) => `without ${capability(token)}`).join(' '));
    }
    default:
      throw new InvalidSpecifierOperatorError(
        operator,
        `${leaf.variable}은(는) ==, !=, in, not in 만 지원합니다`,
        formatMarker(leaf)
      );
  }
}

function evaluateOrderedCapability(
  leaf: MarkerComparison,
  operator: MarkerOperator,
  descriptor: OrderedCapability
): TranslationResult {
  const name = descriptor.capability;
  const literal = leaf.literal.trim();

  switch (operator) {
    case '==':
    case '===':
      return conditionResult(`with ${name} = ${literal}`);
    case '!=':
      return conditionResult(`without ${name} = ${literal}`);
    case '<':
    case '<=':
    case '>':
    case '>=':
      return conditionResult(`with ${name} ${operator} ${literal}`);
    case '~=': {
      const version = parseVersion(literal);
      const upper = formatVersion({ epoch: version.epoch, release: compatibleUpperBound(version, formatMarker(leaf)) });
      return conditionResult(`with ${name} >= ${literal} with ${name} < ${upper}`);
    }
    default:
      throw new InvalidSpecifierOperatorError(
        operator,
        `${leaf.variable}은(는) in, not in 을 지원하지 않습니다`,
        formatMarker(leaf)
      );
  }
}

function evaluateDynamic(
  leaf: MarkerComparison,
  mapping: DynamicVariableMapping
): TranslationResult | undefined {
  const descriptor = mapping.get(leaf.variable);
  if (!descriptor) return undefined;

  const operator = leaf.reversed ? MIRRORED_OPERATORS[leaf.operator] : leaf.operator;
  if (operator === undefined) {
    throw new InvalidSpecifierOperatorError(
      leaf.operator,
      '이 연산자에서는 설치 시점 변수가 오른쪽에 올 수 없습니다',
      formatMarker(leaf)
    );
  }

  return descriptor.kind === 'equality'
    ? evaluateEqualityCapability(leaf, operator, descriptor)
    : evaluateOrderedCapability(leaf, operator, descriptor);
}

function evaluateLeaf(
  leaf: MarkerComparison,
  environment: MarkerEnvironment,
  extras: ReadonlySet<string>,
  mapping: DynamicVariableMapping
): TranslationResult {
  if (leaf.variable === 'extra') {
    return booleanResult(evaluateExtra(leaf, extras));
  }

  if (Object.prototype.hasOwnProperty.call(environment, leaf.variable)) {
    const value = environment[leaf.variable];
    return booleanResult(
      leaf.reversed
        ? compareKnown(leaf.literal, leaf.operator, value)
        : compareKnown(value, leaf.operator, leaf.literal)
    );
  }

  const deferred = evaluateDynamic(leaf, mapping);
  if (deferred) return deferred;

  throw new UnsupportedMarkerVariableError(leaf.variable);
}

function evaluateTree(
  expression: MarkerExpression,
  environment: MarkerEnvironment,
  extras: ReadonlySet<string>,
  mapping: DynamicVariableMapping
): TranslationResult {
  if (expression.type === 'comparison') {
    return evaluateLeaf(expression, environment, extras, mapping);
  }

  const left = evaluateTree(expression.left, environment, extras, mapping);

  if (expression.type === 'and') {
    // 왼쪽이 거짓이면 오른쪽은 평가하지 않음
    if (left.kind === 'boolean' && !left.value) return FALSE_RESULT;
    const right = evaluateTree(expression.right, environment, extras, mapping);
    if (right.kind === 'boolean') return right.value ? left : FALSE_RESULT;
    if (left.kind === 'boolean') return right;
    return conditionResult(`${left.text} ${right.text}`);
  }

  if (left.kind === 'boolean' && left.value) return TRUE_RESULT;
  const right = evaluateTree(expression.right, environment, extras, mapping);
  if (right.kind === 'boolean') return right.value ? TRUE_RESULT : left;
  if (left.kind === 'boolean') return right;
  return conditionResult(`${left.text} or ${right.text}`);
}

/**
 * 마커 식 평가
 *
 * @param expression 파싱된 식 또는 마커 문자열
 * @param environment 변환 시점에 값이 확정된 변수
 * @param extras 활성화된 extras
 * @param mapping 설치 시점 변수 → capability 매핑
 * @throws UnsupportedMarkerVariableError 어느 쪽에도 없는 변수
 * @throws InvalidSpecifierOperatorError 변수 종류에 맞지 않는 연산자
 */
export function evaluateMarker(
  expression: MarkerExpression | string,
  environment: MarkerEnvironment,
  extras: ExtrasInput,
  mapping: DynamicVariableMapping
): TranslationResult {
  const tree = typeof expression === 'string' ? parseMarker(expression) : expression;
  const activeExtras = new Set<string>();
  for (const extra of extras) {
    activeExtras.add(normalizeExtraName(extra));
  }
  return evaluateTree(tree, environment, activeExtras, mapping);
}
