/**
 * convert 명령어
 * 요구사항 문자열(또는 requirements 파일)을 RPM 의존성 절로 변환
 */

import * as fs from 'fs-extra';
import chalk from 'chalk';
import { createRequirementConverter } from '../../core/converter/requirementConverter';
import logger from '../../utils/logger';
import { failCommand, loadEffectiveConfig, splitList, type ConversionCommandOptions } from '../utils';

export interface ConvertOptions extends ConversionCommandOptions {
  file?: string;
  extras?: string;
  tag?: string;
}

/**
 * requirements 파일 읽기: 주석, 빈 줄, pip 옵션 줄(-r, --index-url 등)은 제외
 */
export async function readRequirementsFile(filePath: string): Promise<string[]> {
  const content = await fs.readFile(filePath, 'utf-8');
  const requirements: string[] = [];

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.replace(/(^|\s)#.*$/, '').trim();
    if (!line) continue;
    if (line.startsWith('-')) {
      logger.warn('pip 옵션 줄은 건너뜁니다', { line });
      continue;
    }
    requirements.push(line);
  }

  return requirements;
}

export async function convertCommand(requirements: string[], options: ConvertOptions): Promise<void> {
  try {
    const config = await loadEffectiveConfig(options);
    const converter = createRequirementConverter(config);

    const inputs = [...requirements];
    if (options.file) {
      inputs.push(...(await readRequirementsFile(options.file)));
    }
    if (inputs.length === 0) {
      console.log(chalk.yellow('변환할 요구사항이 없습니다'));
      return;
    }

    const clauses = converter.convert(inputs, splitList(options.extras));
    logger.debug('변환 완료', { input: inputs.length, output: clauses.length });

    if (options.tag) {
      if (clauses.length > 0) {
        console.log(`${options.tag}: ${clauses.join(', ')}`);
      }
      return;
    }
    for (const clause of clauses) {
      console.log(clause);
    }
  } catch (error) {
    failCommand('변환 실패', error);
  }
}
