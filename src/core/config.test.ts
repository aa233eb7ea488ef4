/**
 * config.ts 단위 테스트
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import { ConfigManager, DEFAULT_CONFIG, mergeConfig, parseConfigLayer } from './config';
import { ConfigError } from './shared/errors';

describe('config', () => {
  describe('parseConfigLayer', () => {
    it('알려진 키만 허용', () => {
      expect(() => parseConfigLayer({ packageTemplat: 'python3-{name}' })).toThrow(ConfigError);
      expect(() => parseConfigLayer(['requires'])).toThrow(ConfigError);
      expect(() => parseConfigLayer(null)).toThrow(ConfigError);
    });

    it('값 타입 검증', () => {
      expect(() => parseConfigLayer({ versionStyle: 'semver' })).toThrow(ConfigError);
      expect(() => parseConfigLayer({ strictLocalVersions: 'yes' })).toThrow(ConfigError);
      expect(() => parseConfigLayer({ logLevel: 'verbose' })).toThrow(ConfigError);
      expect(() => parseConfigLayer({ environment: { os_name: 1 } })).toThrow(ConfigError);
      expect(() => parseConfigLayer({ requires: [1, 2] })).toThrow(ConfigError);
    });

    it('dynamicVariables 형식', () => {
      expect(
        parseConfigLayer({ dynamicVariables: { platform_version: { kind: 'ordered', capability: 'glibc' } } })
      ).toEqual({ dynamicVariables: { platform_version: { kind: 'ordered', capability: 'glibc' } } });
      expect(() => parseConfigLayer({ dynamicVariables: { x: { kind: 'range' } } })).toThrow(ConfigError);
      expect(() => parseConfigLayer({ dynamicVariables: { x: 'python(x)' } })).toThrow(ConfigError);
    });

    it('목록은 공백 구분 문자열도 허용', () => {
      expect(parseConfigLayer({ requiresExtras: 'socks  test', suggests: ['python3-docs'] })).toEqual({
        requiresExtras: ['socks', 'test'],
        suggests: ['python3-docs'],
      });
    });

    it('에러에 키 포함', () => {
      try {
        parseConfigLayer({ versionStyle: 'semver' });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigError);
        if (error instanceof ConfigError) {
          expect(error.code).toBe('ECONFIG');
          expect(error.context?.key).toBe('versionStyle');
        }
      }
    });
  });

  describe('mergeConfig', () => {
    it('environment는 키 단위 병합', () => {
      const merged = mergeConfig(DEFAULT_CONFIG, { environment: { os_name: 'nt' }, versionStyle: 'rpm' });
      expect(merged.environment).toEqual({ ...DEFAULT_CONFIG.environment, os_name: 'nt' });
      expect(merged.versionStyle).toBe('rpm');
      expect(merged.dynamicVariables).toEqual(DEFAULT_CONFIG.dynamicVariables);
    });

    it('기본값을 변경하지 않음', () => {
      const merged = mergeConfig(DEFAULT_CONFIG, {});
      merged.requires.push('python3-libs');
      merged.environment.os_name = 'nt';
      expect(DEFAULT_CONFIG.requires).toEqual([]);
      expect(DEFAULT_CONFIG.environment.os_name).toBe('posix');
    });
  });

  describe('ConfigManager', () => {
    let tempDir: string;
    let manager: ConfigManager;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pep2rpm-config-'));
      manager = new ConfigManager(path.join(tempDir, 'home'));
    });

    afterEach(() => {
      fs.removeSync(tempDir);
    });

    it('설정 파일이 없으면 기본값', async () => {
      expect(await manager.loadConfig()).toEqual(DEFAULT_CONFIG);
      expect(manager.getConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('사용자 설정 → --config 파일 → 오버라이드 순서로 병합', async () => {
      await manager.saveConfig({ packageTemplate: 'python-{name}', environment: { os_name: 'nt' } });
      const extraPath = path.join(tempDir, 'extra.json');
      fs.writeJsonSync(extraPath, { versionStyle: 'rpm', packageTemplate: 'py-{name}' });

      const config = await manager.loadConfig(extraPath, { packageTemplate: 'pypi-{name}' });
      expect(config.packageTemplate).toBe('pypi-{name}');
      expect(config.versionStyle).toBe('rpm');
      expect(config.environment.os_name).toBe('nt');
      expect(config.environment.sys_platform).toBe('linux');
    });

    it('--config 파일이 없으면 ConfigError', async () => {
      await expect(manager.loadConfig(path.join(tempDir, 'missing.json'))).rejects.toThrow(ConfigError);
    });

    it('잘못된 설정 파일은 ConfigError', async () => {
      const extraPath = path.join(tempDir, 'bad.json');
      fs.writeJsonSync(extraPath, { unknownKey: true });
      await expect(manager.loadConfig(extraPath)).rejects.toThrow(ConfigError);
    });

    it('set은 검증 후 저장', () => {
      manager.set('versionStyle', 'rpm');
      manager.set('requiresExtras', ['socks']);
      expect(fs.readJsonSync(manager.getConfigPath())).toEqual({ versionStyle: 'rpm', requiresExtras: ['socks'] });
      expect(manager.getConfig().versionStyle).toBe('rpm');

      expect(() => manager.set('versionStyle', 'semver')).toThrow(ConfigError);
      expect(() => manager.set('unknownKey', 1)).toThrow(ConfigError);
      expect(manager.getConfig().versionStyle).toBe('rpm');
    });

    it('reset은 기본값으로', () => {
      manager.set('packageTemplate', 'python-{name}');
      manager.reset();
      expect(manager.getConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('경로', () => {
      expect(manager.getConfigDir()).toBe(path.join(tempDir, 'home'));
      expect(manager.getConfigPath()).toBe(path.join(tempDir, 'home', 'settings.json'));
      expect(manager.getLogsDir()).toBe(path.join(tempDir, 'home', 'logs'));
    });
  });
});
