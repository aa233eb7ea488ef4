import { describe, it, expect } from 'vitest';
import { parseRequirement, normalizeExtraName } from './requirement-parser';
import { formatSpecifier } from './specifier';
import { InvalidRequirementError, InvalidMarkerError } from './errors';

describe('requirement-parser', () => {
  it('이름만 있는 요구사항', () => {
    expect(parseRequirement('requests')).toEqual({ name: 'requests', extras: [], specifiers: [] });
  });

  it('버전 지정자와 extras', () => {
    const req = parseRequirement('urllib3[socks, secure]>=1.21.1,<1.27');
    expect(req.name).toBe('urllib3');
    expect(req.extras).toEqual(['socks', 'secure']);
    expect(req.specifiers.map(formatSpecifier)).toEqual(['>=1.21.1', '<1.27']);
  });

  it('괄호로 감싼 지정자와 마커', () => {
    const req = parseRequirement("package (!=2.0.4,>=2.0.1) ; python_version < '3.8'");
    expect(req.specifiers.map(formatSpecifier)).toEqual(['!=2.0.4', '>=2.0.1']);
    expect(req.markerText).toBe("python_version < '3.8'");
    expect(req.marker).toEqual({
      type: 'comparison',
      variable: 'python_version',
      operator: '<',
      literal: '3.8',
      reversed: false,
    });
  });

  it('URL 요구사항', () => {
    const req = parseRequirement('pip @ https://example.com/pip-23.0.tar.gz ; os_name == "posix"');
    expect(req.url).toBe('https://example.com/pip-23.0.tar.gz');
    expect(req.specifiers).toEqual([]);
    expect(req.markerText).toBe('os_name == "posix"');
  });

  it('문법 오류', () => {
    expect(() => parseRequirement('>=1.0')).toThrow(InvalidRequirementError);
    expect(() => parseRequirement('pkg[extra')).toThrow(InvalidRequirementError);
    expect(() => parseRequirement('pkg (>=1.0')).toThrow(InvalidRequirementError);
    expect(() => parseRequirement('pkg @ https://example.com/x.zip extra')).toThrow(InvalidRequirementError);
    expect(() => parseRequirement('pkg >=1.0 ;')).toThrow(InvalidRequirementError);
    expect(() => parseRequirement('pkg ; os_name ==')).toThrow(InvalidMarkerError);
  });

  it('extra 이름 정규화', () => {
    expect(normalizeExtraName('Socks_Proxy')).toBe('socks-proxy');
    expect(normalizeExtraName('a.-_b')).toBe('a-b');
  });
});
