/**
 * tags 명령어
 * 메타데이터 파일(METADATA, PKG-INFO 또는 JSON)로부터 의존성 태그 라인 생성
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import chalk from 'chalk';
import { buildDependencyTags } from '../../core/converter/dependencyTags';
import { createRequirementConverter } from '../../core/converter/requirementConverter';
import {
  metadataFromJson,
  parseMetadataText,
  type PackageMetadata,
} from '../../core/shared/package-metadata';
import logger from '../../utils/logger';
import { failCommand, loadEffectiveConfig, type ConversionCommandOptions } from '../utils';

export interface TagsOptions extends ConversionCommandOptions {
  buildRequires?: string[];
  pythonVersion?: string;
}

export async function loadPackageMetadata(filePath: string): Promise<PackageMetadata> {
  if (path.extname(filePath).toLowerCase() === '.json') {
    return metadataFromJson(await fs.readJson(filePath));
  }
  return parseMetadataText(await fs.readFile(filePath, 'utf-8'));
}

export async function tagsCommand(metadataPath: string, options: TagsOptions): Promise<void> {
  try {
    const config = await loadEffectiveConfig(options);
    if (options.pythonVersion) {
      config.pythonVersion = options.pythonVersion;
    }

    const metadata = await loadPackageMetadata(metadataPath);
    if (options.buildRequires && options.buildRequires.length > 0) {
      metadata.buildRequires = [...(metadata.buildRequires ?? []), ...options.buildRequires];
    }
    logger.debug('메타데이터 로드', {
      name: metadata.name,
      requiresDist: metadata.requiresDist?.length ?? 0,
      extras: metadata.providesExtra,
    });

    const lines = buildDependencyTags(metadata, config, createRequirementConverter(config));
    if (lines.length === 0) {
      console.log(chalk.yellow('의존성이 없습니다'));
      return;
    }
    for (const line of lines) {
      console.log(line);
    }
  } catch (error) {
    failCommand('태그 생성 실패', error);
  }
}
