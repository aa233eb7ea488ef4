import { getConfigManager, type Config, type ConfigLayer } from '../core/config';
import { isConversionError } from '../core/shared/errors';
import logger from '../utils/logger';

/**
 * 변환 관련 명령어 공통 옵션
 */
export interface ConversionCommandOptions {
  config?: string;
  rpmVersions?: boolean;
  strictLocal?: boolean;
  template?: string;
  env?: string[];
}

/**
 * --env KEY=VALUE 반복 옵션 수집기
 */
export function collectOption(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * 쉼표 또는 공백으로 구분된 목록 파싱
 */
export function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(/[\s,]+/).filter((item) => item.length > 0);
}

function parseEnvironmentPairs(pairs: readonly string[]): Record<string, string> {
  const environment: Record<string, string> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      throw new Error(`--env 형식은 KEY=VALUE 입니다: ${pair}`);
    }
    environment[pair.slice(0, eq).trim()] = pair.slice(eq + 1);
  }
  return environment;
}

/**
 * CLI 옵션을 설정 레이어로 변환 (지정된 옵션만 포함)
 */
export function optionsToLayer(options: ConversionCommandOptions): ConfigLayer {
  const layer: ConfigLayer = {};
  if (options.rpmVersions) layer.versionStyle = 'rpm';
  if (options.strictLocal) layer.strictLocalVersions = true;
  if (options.template) layer.packageTemplate = options.template;
  if (options.env && options.env.length > 0) layer.environment = parseEnvironmentPairs(options.env);
  return layer;
}

/**
 * 기본값, 사용자 설정, --config 파일, CLI 옵션을 합친 설정
 */
export async function loadEffectiveConfig(options: ConversionCommandOptions): Promise<Config> {
  const config = await getConfigManager().loadConfig(options.config, optionsToLayer(options));
  logger.debug('설정 로드 완료', { versionStyle: config.versionStyle, packageTemplate: config.packageTemplate });
  return config;
}

/**
 * 명령어 실패 처리: 에러 로그를 남기고 종료 코드 1
 */
export function failCommand(context: string, error: unknown): void {
  if (isConversionError(error)) {
    logger.logError(error, context, { code: error.code, ...error.context });
  } else if (error instanceof Error) {
    logger.logError(error, context);
  } else {
    logger.error(`${context}: ${String(error)}`);
  }
  process.exitCode = 1;
}
