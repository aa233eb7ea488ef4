import { describe, it, expect } from 'vitest';
import { evaluateMarker, TRUE_RESULT, FALSE_RESULT, type TranslationResult } from './markerEvaluator';
import { createDynamicMapping } from './dynamicMapping';
import { parseMarker } from '../shared/marker-parser';
import { InvalidSpecifierOperatorError, UnsupportedMarkerVariableError } from '../shared/errors';

const ENVIRONMENT = {
  os_name: 'posix',
  sys_platform: 'linux',
  platform_system: 'Linux',
  implementation_name: 'cpython',
  platform_python_implementation: 'CPython',
};

const MAPPING = createDynamicMapping();

function evaluate(marker: string, extras: string[] = []): TranslationResult {
  return evaluateMarker(marker, ENVIRONMENT, extras, MAPPING);
}

function condition(text: string): TranslationResult {
  return { kind: 'condition', text };
}

describe('markerEvaluator', () => {
  describe('변환 시점 변수', () => {
    it('문자열 비교', () => {
      expect(evaluate('os_name == "nt"')).toEqual(FALSE_RESULT);
      expect(evaluate('os_name != "nt" and implementation_name == "cpython"')).toEqual(TRUE_RESULT);
      expect(evaluate('platform_python_implementation === "CPython"')).toEqual(TRUE_RESULT);
    });

    it('in / not in 은 토큰 집합 포함 여부', () => {
      expect(evaluate('sys_platform in "linux darwin"')).toEqual(TRUE_RESULT);
      expect(evaluate('sys_platform in "win32,cygwin"')).toEqual(FALSE_RESULT);
      expect(evaluate('sys_platform not in "win32 cygwin"')).toEqual(TRUE_RESULT);
      expect(evaluate('"lin" in sys_platform')).toEqual(FALSE_RESULT);
    });

    it('버전이면 PEP 440 비교, 아니면 문자열 비교', () => {
      const env = { ...ENVIRONMENT, implementation_version: '3.10.2' };
      const run = (marker: string): TranslationResult => evaluateMarker(marker, env, [], MAPPING);
      expect(run('implementation_version >= "3.9"')).toEqual(TRUE_RESULT);
      expect(run('implementation_version < "3.9"')).toEqual(FALSE_RESULT);
      expect(run('implementation_version ~= "3.10"')).toEqual(TRUE_RESULT);
      expect(run('implementation_version == "3.10.*"')).toEqual(TRUE_RESULT);
      expect(run('"3.9" < implementation_version')).toEqual(TRUE_RESULT);
      expect(evaluate('os_name > "nt"')).toEqual(TRUE_RESULT);
    });

    it('버전이 아닌 값에 ~= 는 에러', () => {
      expect(() => evaluate('os_name ~= "nt"')).toThrow(InvalidSpecifierOperatorError);
    });

    it('환경 값이 동적 매핑보다 우선', () => {
      const env = { ...ENVIRONMENT, platform_machine: 'x86_64' };
      expect(evaluateMarker('platform_machine == "x86_64"', env, [], MAPPING)).toEqual(TRUE_RESULT);
    });
  });

  describe('extra', () => {
    it('활성 extras 포함 여부', () => {
      expect(evaluate('extra == "micro"')).toEqual(FALSE_RESULT);
      expect(evaluate('extra == "micro"', ['micro'])).toEqual(TRUE_RESULT);
      expect(evaluate('extra == "micro" and os_name == "nt"', ['micro'])).toEqual(FALSE_RESULT);
      expect(evaluate('extra == "micro" and os_name == "posix"')).toEqual(FALSE_RESULT);
      expect(evaluate('extra == "micro" and os_name == "posix"', ['micro'])).toEqual(TRUE_RESULT);
      expect(evaluate('extra != "micro"')).toEqual(TRUE_RESULT);
    });

    it('PEP 685 정규화', () => {
      expect(evaluate('extra == "Socks_Proxy"', ['socks-proxy'])).toEqual(TRUE_RESULT);
      expect(evaluate('extra == "socks-proxy"', ['SOCKS.proxy'])).toEqual(TRUE_RESULT);
    });

    it('in / not in', () => {
      expect(evaluate('extra in "test, docs"', ['docs'])).toEqual(TRUE_RESULT);
      expect(evaluate('extra not in "test docs"', ['docs'])).toEqual(FALSE_RESULT);
      expect(evaluate('"test" in extra', ['test'])).toEqual(TRUE_RESULT);
    });

    it('순서 비교는 에러', () => {
      expect(() => evaluate('extra > "a"')).toThrow(InvalidSpecifierOperatorError);
    });
  });

  describe('설치 시점 변수', () => {
    it('equality capability', () => {
      expect(evaluate('platform_machine == "x86-64"')).toEqual(condition('with python(x86-64)'));
      expect(evaluate('platform_machine != "x86"')).toEqual(condition('without python(x86)'));
      expect(evaluate('"aarch64" == platform_machine')).toEqual(condition('with python(aarch64)'));
    });

    it('equality capability의 in / not in', () => {
      expect(evaluate('platform_machine in "x86_64 aarch64"')).toEqual(
        condition('with python(x86_64) or with python(aarch64)')
      );
      expect(evaluate('platform_machine not in "x86_64, aarch64"')).toEqual(
        condition('without python(x86_64) without python(aarch64)')
      );
      expect(evaluate('platform_machine in ""')).toEqual(FALSE_RESULT);
      expect(evaluate('platform_machine not in ""')).toEqual(TRUE_RESULT);
    });

    it('equality capability에 순서 비교는 에러', () => {
      expect(() => evaluate('platform_machine > "x86"')).toThrow(InvalidSpecifierOperatorError);
    });

    it('ordered capability', () => {
      expect(evaluate('platform_release > "3.4"')).toEqual(condition('with kernel > 3.4'));
      expect(evaluate('python_version < "3.4"')).toEqual(condition('with python(abi) < 3.4'));
      expect(evaluate('python_version == "3.8"')).toEqual(condition('with python(abi) = 3.8'));
      expect(evaluate('python_version != "3.8"')).toEqual(condition('without python(abi) = 3.8'));
      expect(evaluate('python_version ~= "3.8"')).toEqual(
        condition('with python(abi) >= 3.8 with python(abi) < 4')
      );
    });

    it('리터럴이 왼쪽이면 연산자를 뒤집음', () => {
      expect(evaluate('"3.4" < python_version')).toEqual(condition('with python(abi) > 3.4'));
      expect(evaluate('"5.0" >= platform_release')).toEqual(condition('with kernel <= 5.0'));
    });

    it('ordered capability에 in 은 에러', () => {
      expect(() => evaluate('python_version in "3.8 3.9"')).toThrow(InvalidSpecifierOperatorError);
      expect(() => evaluate('"3.8" in python_version')).toThrow(InvalidSpecifierOperatorError);
    });
  });

  describe('and / or 단락 평가', () => {
    it('조건끼리 연결', () => {
      expect(evaluate('platform_machine == "x86-64" and platform_release > "3.4"')).toEqual(
        condition('with python(x86-64) with kernel > 3.4')
      );
      expect(evaluate('platform_machine != "x86" and platform_release > "5.14"')).toEqual(
        condition('without python(x86) with kernel > 5.14')
      );
      expect(evaluate('platform_machine == "x86-64" or python_version < "3.4"')).toEqual(
        condition('with python(x86-64) or with python(abi) < 3.4')
      );
    });

    it('불리언과 조건 결합', () => {
      expect(evaluate('os_name == "nt" and platform_machine == "x86-64" or platform_release > "3.4"')).toEqual(
        condition('with kernel > 3.4')
      );
      expect(evaluate('extra == "micro" or platform_machine == "x86-64"')).toEqual(
        condition('with python(x86-64)')
      );
      expect(evaluate('extra == "micro" or platform_machine == "x86-64"', ['micro'])).toEqual(TRUE_RESULT);
      expect(evaluate('platform_machine == "x86-64" and os_name == "posix"')).toEqual(
        condition('with python(x86-64)')
      );
      expect(evaluate('platform_machine == "x86-64" and os_name == "nt"')).toEqual(FALSE_RESULT);
      expect(evaluate('platform_machine == "x86-64" or os_name == "posix"')).toEqual(TRUE_RESULT);
      expect(evaluate('platform_machine == "x86-64" or os_name == "nt"')).toEqual(condition('with python(x86-64)'));
    });

    it('왼쪽이 확정되면 오른쪽은 평가하지 않음', () => {
      expect(evaluate('os_name == "nt" and unknown_variable == "x"')).toEqual(FALSE_RESULT);
      expect(evaluate('os_name == "posix" or unknown_variable == "x"')).toEqual(TRUE_RESULT);
    });

    it('왼쪽에 알 수 없는 변수가 있으면 에러', () => {
      expect(() => evaluate('unknown_variable == "x" and os_name == "nt"')).toThrow(UnsupportedMarkerVariableError);
    });
  });

  it('알 수 없는 변수', () => {
    expect(() => evaluate('platform_version == "1"')).toThrow(UnsupportedMarkerVariableError);
  });

  it('파싱된 식도 받음, 입력은 바뀌지 않음', () => {
    const tree = parseMarker('"3.4" < python_version');
    const before = JSON.stringify(tree);
    const extras = ['Test'];
    expect(evaluateMarker(tree, ENVIRONMENT, extras, MAPPING)).toEqual(condition('with python(abi) > 3.4'));
    expect(JSON.stringify(tree)).toBe(before);
    expect(extras).toEqual(['Test']);
  });
});
