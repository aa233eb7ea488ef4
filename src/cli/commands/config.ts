import chalk from 'chalk';
import Table from 'cli-table3';
import { getConfigManager, type Config } from '../../core/config';
import { failCommand } from '../utils';

const DESCRIPTIONS: Record<keyof Config, string> = {
  environment: '변환 시점 마커 변수 값',
  dynamicVariables: '설치 시점 변수 매핑',
  packageTemplate: '패키지 capability 템플릿',
  pythonAbiCapability: 'Python ABI capability',
  versionStyle: '버전 표기 (literal, rpm)',
  strictLocalVersions: '혼합 로컬 세그먼트 거부',
  requires: '추가 Requires',
  suggests: '추가 선택 의존성',
  requiresExtras: 'Requires에 포함할 extra',
  suggestsExtras: '선택 의존성에 포함할 extra',
  optionalDependencyTag: '선택 의존성 태그',
  pythonVersion: 'Python 버전 지정자',
  logLevel: '로그 레벨',
};

function isConfigKey(key: string): key is keyof Config {
  return Object.prototype.hasOwnProperty.call(DESCRIPTIONS, key);
}

/**
 * CLI 문자열 값 파싱: JSON으로 읽히면 JSON 값, 아니면 문자열 그대로
 */
export function parseConfigValue(value: string): unknown {
  try {
    const parsed: unknown = JSON.parse(value);
    return parsed;
  } catch {
    return value;
  }
}

/**
 * 설정값 조회
 */
export async function configGet(key?: string): Promise<void> {
  try {
    const config = getConfigManager().getConfig();

    if (!key) {
      console.log(chalk.cyan('\n현재 설정:'));
      console.log(JSON.stringify(config, null, 2));
      return;
    }

    if (isConfigKey(key) && config[key] !== undefined) {
      console.log(chalk.cyan(`${key}: `) + chalk.white(JSON.stringify(config[key])));
    } else {
      console.log(chalk.yellow(`설정 '${key}'를 찾을 수 없습니다`));
    }
  } catch (error) {
    failCommand('설정 조회 실패', error);
  }
}

/**
 * 설정값 변경
 */
export async function configSet(key: string, value: string): Promise<void> {
  try {
    const parsedValue = parseConfigValue(value);
    getConfigManager().set(key, parsedValue);
    console.log(chalk.green(`✓ 설정이 저장되었습니다: ${key} = ${JSON.stringify(parsedValue)}`));
  } catch (error) {
    failCommand('설정 저장 실패', error);
  }
}

/**
 * 모든 설정 표시
 */
export async function configList(): Promise<void> {
  try {
    const configManager = getConfigManager();
    const config = configManager.getConfig();

    const table = new Table({
      head: [chalk.cyan('설정'), chalk.cyan('값'), chalk.cyan('설명')],
      colWidths: [25, 40, 30],
      wordWrap: true,
    });

    for (const [key, value] of Object.entries(config)) {
      table.push([key, typeof value === 'string' ? value : JSON.stringify(value), isConfigKey(key) ? DESCRIPTIONS[key] : '-']);
    }

    console.log(chalk.cyan(`\n설정 목록 (${configManager.getConfigPath()}):\n`));
    console.log(table.toString());
  } catch (error) {
    failCommand('설정 조회 실패', error);
  }
}

/**
 * 설정 초기화
 */
export async function configReset(): Promise<void> {
  try {
    getConfigManager().reset();
    console.log(chalk.green('✓ 설정이 초기화되었습니다'));
  } catch (error) {
    failCommand('설정 초기화 실패', error);
  }
}
