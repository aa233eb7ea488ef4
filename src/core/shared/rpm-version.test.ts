import { describe, it, expect } from 'vitest';
import { rpmvercmp, parseRpmLabel, compareRpmLabels, encodeVersion } from './rpm-version';
import { comparePep440Versions, parseVersion } from './pep440-version';
import { InconsistentLocalSegmentError, MalformedVersionError } from './errors';

describe('rpm-version', () => {
  describe('rpmvercmp', () => {
    it('숫자 세그먼트 비교', () => {
      expect(rpmvercmp('1.0', '1.0')).toBe(0);
      expect(rpmvercmp('1.0', '2.0')).toBe(-1);
      expect(rpmvercmp('2.0', '1.0')).toBe(1);
      expect(rpmvercmp('2.0', '2.0.1')).toBe(-1);
      expect(rpmvercmp('5.5p1', '5.5p10')).toBe(-1);
      expect(rpmvercmp('1.01', '1.1')).toBe(0);
    });

    it('숫자 세그먼트가 문자 세그먼트보다 큼', () => {
      expect(rpmvercmp('10xyz', '10.1xyz')).toBe(-1);
      expect(rpmvercmp('xyz10', 'xyz10.1')).toBe(-1);
      expect(rpmvercmp('2.0.1a', '2.0.1')).toBe(1);
    });

    it('~ 는 문자열 끝보다도 작음', () => {
      expect(rpmvercmp('1.0~rc1', '1.0')).toBe(-1);
      expect(rpmvercmp('1.0~rc1', '1.0~rc2')).toBe(-1);
      expect(rpmvercmp('1.0~rc1~git123', '1.0~rc1')).toBe(-1);
      expect(rpmvercmp('1.0~~dev1', '1.0~a1')).toBe(-1);
    });

    it('^ 는 문자열 끝보다 크고 다른 세그먼트보다 작음', () => {
      expect(rpmvercmp('1.0^', '1.0')).toBe(1);
      expect(rpmvercmp('1.0^git1', '1.0.1')).toBe(-1);
      expect(rpmvercmp('1.0^git1', '1.0^git2')).toBe(-1);
      expect(rpmvercmp('1.0^git1', '1.0~rc1')).toBe(1);
      expect(rpmvercmp('1.0~rc1^git1', '1.0~rc1')).toBe(1);
    });
  });

  describe('parseRpmLabel / compareRpmLabels', () => {
    it('epoch, version, release 분리', () => {
      expect(parseRpmLabel('2:1.0~a1-3')).toEqual({ epoch: 2n, version: '1.0~a1', release: '3' });
      expect(parseRpmLabel('1.0')).toEqual({ epoch: 0n, version: '1.0' });
    });

    it('epoch 우선, release는 양쪽에 있을 때만 비교', () => {
      expect(compareRpmLabels('1:1.0', '2.0')).toBe(1);
      expect(compareRpmLabels('1.0-1', '1.0-2')).toBe(-1);
      expect(compareRpmLabels('1.0', '1.0-5')).toBe(0);
      expect(compareRpmLabels('9007199254740993:1.0', '9007199254740992:2.0')).toBe(1);
    });
  });

  describe('encodeVersion', () => {
    it('릴리스는 최소 두 자리로 정규화', () => {
      expect(encodeVersion('1')).toBe('1.0');
      expect(encodeVersion('1.0.0')).toBe('1.0');
      expect(encodeVersion('1.2.3')).toBe('1.2.3');
      expect(encodeVersion('1.0.0.1')).toBe('1.0.0.1');
    });

    it('pre, dev, post 인코딩', () => {
      expect(encodeVersion('1.0a1')).toBe('1.0~a1');
      expect(encodeVersion('1.0-ALPHA.1')).toBe('1.0~a1');
      expect(encodeVersion('1.0.dev1')).toBe('1.0~~dev1');
      expect(encodeVersion('1.0a1.dev2')).toBe('1.0~a1~dev2');
      expect(encodeVersion('1.0.post1')).toBe('1.0.post1');
      expect(encodeVersion('1.0.post1.dev2')).toBe('1.0.post1~dev2');
      expect(encodeVersion('2.0rc1.post1')).toBe('2.0~rc1.post1');
    });

    it('epoch와 로컬 세그먼트', () => {
      expect(encodeVersion('1!2.0.post1')).toBe('1:2.0.post1');
      expect(encodeVersion('1.0+ubuntu-1')).toBe('1.0^ubuntu.1');
      expect(encodeVersion(parseVersion('3.1+5'))).toBe('3.1^5');
    });

    it('2^53을 넘는 세그먼트는 자릿수 그대로', () => {
      expect(encodeVersion('1.20240101123456789')).toBe('1.20240101123456789');
      expect(encodeVersion('9007199254740993!1.0rc9007199254740993.post18446744073709551617')).toBe(
        '9007199254740993:1.0~rc9007199254740993.post18446744073709551617'
      );
      expect(
        compareRpmLabels(encodeVersion('1.9007199254740993'), encodeVersion('1.9007199254740992'))
      ).toBe(1);
    });

    it('인코딩 결과에 - 가 없음', () => {
      expect(encodeVersion('1.0-1')).toBe('1.0.post1');
      expect(encodeVersion('1.0+a-b-c')).toBe('1.0^a.b.c');
    });

    it('혼합 로컬 세그먼트는 strictLocal에서만 에러', () => {
      expect(encodeVersion('1.0+ubuntu10')).toBe('1.0^ubuntu10');
      expect(() => encodeVersion('1.0+ubuntu10', { strictLocal: true })).toThrow(InconsistentLocalSegmentError);
      expect(encodeVersion('1.0+ubuntu.10', { strictLocal: true })).toBe('1.0^ubuntu.10');
    });

    it('잘못된 버전은 MalformedVersionError', () => {
      expect(() => encodeVersion('1.0-beta_x')).toThrow(MalformedVersionError);
    });

    it('인코딩 후 RPM 순서가 PEP 440 순서와 같음', () => {
      const corpus = [
        '0.9',
        '1.0.dev0',
        '1.0.dev1',
        '1.0a1.dev1',
        '1.0a1',
        '1.0a1.post1.dev1',
        '1.0a1.post1',
        '1.0a2',
        '1.0b1.dev3',
        '1.0b1',
        '1.0rc1',
        '1.0rc2.post1',
        '1',
        '1.0.0',
        '1.0+local',
        '1.0+local.2',
        '1.0+local.10',
        '1.0+5',
        '1.0.post1.dev1',
        '1.0.post1',
        '1.0.post1+abc',
        '1.0.post2',
        '1.0.0.1',
        '1.0.1',
        '1.0.10',
        '1.1.dev1',
        '1.1a1',
        '1.1',
        '2.0',
        '10.0',
        '1!0.1',
        '1!1.0a1',
        '1!1.0',
      ];

      const mismatches: string[] = [];
      for (let i = 0; i < corpus.length; i++) {
        for (let j = i + 1; j < corpus.length; j++) {
          const expected = comparePep440Versions(corpus[i], corpus[j]);
          const actual = compareRpmLabels(encodeVersion(corpus[i]), encodeVersion(corpus[j]));
          if (expected !== actual) {
            mismatches.push(`${corpus[i]} vs ${corpus[j]}`);
          }
        }
      }
      expect(mismatches).toEqual([]);
    });
  });
});
