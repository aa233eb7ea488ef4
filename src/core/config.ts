import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import { ConfigError } from './shared/errors';
import { DEFAULT_DYNAMIC_VARIABLES, type DynamicVariableConfig } from './converter/dynamicMapping';
import { VERSION_STYLES, type VersionStyle } from './converter/specifierTranslator';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

// 설정 인터페이스 정의
export interface Config {
  // 변환 시점에 값이 확정된 마커 변수
  environment: Record<string, string>;
  // 설치 시점 변수 → capability 매핑
  dynamicVariables: Record<string, DynamicVariableConfig>;

  // capability 이름
  packageTemplate: string;
  pythonAbiCapability: string;

  // 버전 표기
  versionStyle: VersionStyle;
  strictLocalVersions: boolean;

  // 의존성 태그
  requires: string[];
  suggests: string[];
  requiresExtras: string[];
  suggestsExtras: string[];
  optionalDependencyTag: string;
  pythonVersion?: string;

  // 기타 설정
  logLevel: LogLevel;
}

/** 설정 파일 하나 또는 CLI 옵션이 덮어쓰는 값 */
export type ConfigLayer = Partial<Config>;

// 기본 설정값 (Linux 대상 RPM 기준)
export const DEFAULT_CONFIG: Config = {
  environment: {
    os_name: 'posix',
    sys_platform: 'linux',
    platform_system: 'Linux',
    implementation_name: 'cpython',
    platform_python_implementation: 'CPython',
  },
  dynamicVariables: { ...DEFAULT_DYNAMIC_VARIABLES },
  packageTemplate: 'python3-{name}',
  pythonAbiCapability: 'python(abi)',
  versionStyle: 'literal',
  strictLocalVersions: false,
  requires: [],
  suggests: [],
  requiresExtras: [],
  suggestsExtras: [],
  optionalDependencyTag: 'Suggests',
  logLevel: 'info',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function expectString(key: string, value: unknown): string {
  if (typeof value !== 'string') {
    throw new ConfigError(key, '문자열이어야 합니다');
  }
  return value;
}

function expectStringArray(key: string, value: unknown): string[] {
  // 공백으로 구분된 문자열도 허용 ("test docs")
  if (typeof value === 'string') {
    return value.split(/\s+/).filter((item) => item.length > 0);
  }
  if (!isStringArray(value)) {
    throw new ConfigError(key, '문자열 배열이어야 합니다');
  }
  return [...value];
}

function expectStringRecord(key: string, value: unknown): Record<string, string> {
  if (!isRecord(value)) {
    throw new ConfigError(key, '객체여야 합니다');
  }
  const result: Record<string, string> = {};
  for (const [name, entry] of Object.entries(value)) {
    result[name] = expectString(`${key}.${name}`, entry);
  }
  return result;
}

function parseDynamicVariables(value: unknown): Record<string, DynamicVariableConfig> {
  if (!isRecord(value)) {
    throw new ConfigError('dynamicVariables', '객체여야 합니다');
  }

  const result: Record<string, DynamicVariableConfig> = {};
  for (const [variable, entry] of Object.entries(value)) {
    const key = `dynamicVariables.${variable}`;
    if (!isRecord(entry)) {
      throw new ConfigError(key, "{ kind, template | capability } 형식이어야 합니다");
    }
    if (entry.kind === 'equality') {
      result[variable] = { kind: 'equality', template: expectString(`${key}.template`, entry.template) };
    } else if (entry.kind === 'ordered') {
      result[variable] = { kind: 'ordered', capability: expectString(`${key}.capability`, entry.capability) };
    } else {
      throw new ConfigError(`${key}.kind`, "'equality' 또는 'ordered'여야 합니다");
    }
  }
  return result;
}

function parseVersionStyle(value: unknown): VersionStyle {
  const style = VERSION_STYLES.find((candidate) => candidate === value);
  if (style === undefined) {
    throw new ConfigError('versionStyle', `${VERSION_STYLES.join(', ')} 중 하나여야 합니다: ${String(value)}`);
  }
  return style;
}

function parseLogLevel(value: unknown): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  if (level === undefined) {
    throw new ConfigError('logLevel', `${LOG_LEVELS.join(', ')} 중 하나여야 합니다: ${String(value)}`);
  }
  return level;
}

/**
 * JSON 값 하나를 설정 레이어로 검증
 * @throws ConfigError 알 수 없는 키 또는 잘못된 값
 */
export function parseConfigLayer(raw: unknown): ConfigLayer {
  if (!isRecord(raw)) {
    throw new ConfigError('(root)', '설정 파일은 JSON 객체여야 합니다');
  }

  const layer: ConfigLayer = {};
  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case 'environment':
        layer.environment = expectStringRecord(key, value);
        break;
      case 'dynamicVariables':
        layer.dynamicVariables = parseDynamicVariables(value);
        break;
      case 'packageTemplate':
        layer.packageTemplate = expectString(key, value);
        break;
      case 'pythonAbiCapability':
        layer.pythonAbiCapability = expectString(key, value);
        break;
      case 'versionStyle':
        layer.versionStyle = parseVersionStyle(value);
        break;
      case 'strictLocalVersions':
        if (typeof value !== 'boolean') {
          throw new ConfigError(key, 'true 또는 false여야 합니다');
        }
        layer.strictLocalVersions = value;
        break;
      case 'requires':
      case 'suggests':
      case 'requiresExtras':
      case 'suggestsExtras':
        layer[key] = expectStringArray(key, value);
        break;
      case 'optionalDependencyTag':
        layer.optionalDependencyTag = expectString(key, value);
        break;
      case 'pythonVersion':
        layer.pythonVersion = expectString(key, value);
        break;
      case 'logLevel':
        layer.logLevel = parseLogLevel(value);
        break;
      default:
        throw new ConfigError(key, '알 수 없는 설정 키입니다');
    }
  }
  return layer;
}

/**
 * 설정 병합. environment, dynamicVariables는 키 단위로 합치고 나머지는 덮어씀
 * (레이어에 undefined 값을 넣지 말 것)
 */
export function mergeConfig(base: Config, layer: ConfigLayer): Config {
  return {
    ...base,
    ...layer,
    environment: { ...base.environment, ...layer.environment },
    dynamicVariables: { ...base.dynamicVariables, ...layer.dynamicVariables },
    requires: [...(layer.requires ?? base.requires)],
    suggests: [...(layer.suggests ?? base.suggests)],
    requiresExtras: [...(layer.requiresExtras ?? base.requiresExtras)],
    suggestsExtras: [...(layer.suggestsExtras ?? base.suggestsExtras)],
  };
}

export class ConfigManager {
  private configDir: string;
  private configPath: string;
  private logsDir: string;

  constructor(configDir: string = path.join(os.homedir(), '.pep2rpm')) {
    this.configDir = configDir;
    this.configPath = path.join(this.configDir, 'settings.json');
    this.logsDir = path.join(this.configDir, 'logs');
  }

  /**
   * 필요한 디렉토리들을 생성합니다.
   */
  async ensureDirectories(): Promise<void> {
    await fs.ensureDir(this.configDir);
    await fs.ensureDir(this.logsDir);
  }

  /**
   * 설정을 로드합니다.
   * 기본값 → ~/.pep2rpm/settings.json → extraPath → overrides 순으로 병합
   */
  async loadConfig(extraPath?: string, overrides: ConfigLayer = {}): Promise<Config> {
    let config = mergeConfig(DEFAULT_CONFIG, {});

    if (await fs.pathExists(this.configPath)) {
      config = mergeConfig(config, parseConfigLayer(await fs.readJson(this.configPath)));
    }

    if (extraPath) {
      if (!(await fs.pathExists(extraPath))) {
        throw new ConfigError('--config', `설정 파일을 찾을 수 없습니다: ${extraPath}`);
      }
      config = mergeConfig(config, parseConfigLayer(await fs.readJson(extraPath)));
    }

    return mergeConfig(config, overrides);
  }

  /**
   * 설정을 저장합니다.
   */
  async saveConfig(config: ConfigLayer): Promise<void> {
    await this.ensureDirectories();
    await fs.writeJson(this.configPath, config, { spaces: 2 });
  }

  /**
   * 설정 디렉토리 경로를 반환합니다.
   */
  getConfigDir(): string {
    return this.configDir;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * 로그 디렉토리 경로를 반환합니다.
   */
  getLogsDir(): string {
    return this.logsDir;
  }

  /**
   * 설정을 동기적으로 로드합니다 (CLI용, 사용자 설정 파일만 반영).
   */
  getConfig(): Config {
    if (!fs.pathExistsSync(this.configPath)) {
      return mergeConfig(DEFAULT_CONFIG, {});
    }
    return mergeConfig(DEFAULT_CONFIG, parseConfigLayer(fs.readJsonSync(this.configPath)));
  }

  /**
   * 설정값을 동기적으로 설정합니다 (CLI용). 저장 전에 값을 검증합니다.
   */
  set(key: string, value: unknown): void {
    parseConfigLayer({ [key]: value });

    fs.ensureDirSync(this.configDir);
    let stored: Record<string, unknown> = {};
    if (fs.pathExistsSync(this.configPath)) {
      const raw: unknown = fs.readJsonSync(this.configPath);
      if (isRecord(raw)) stored = raw;
    }

    stored[key] = value;
    fs.writeJsonSync(this.configPath, stored, { spaces: 2 });
  }

  /**
   * 설정을 동기적으로 초기화합니다 (CLI용).
   */
  reset(): void {
    fs.ensureDirSync(this.configDir);
    fs.writeJsonSync(this.configPath, {}, { spaces: 2 });
  }
}

// 싱글톤 인스턴스
let configManagerInstance: ConfigManager | null = null;

export function getConfigManager(): ConfigManager {
  if (!configManagerInstance) {
    configManagerInstance = new ConfigManager();
  }
  return configManagerInstance;
}
