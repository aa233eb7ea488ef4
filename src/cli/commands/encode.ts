import chalk from 'chalk';
import Table from 'cli-table3';
import { comparePep440Versions, formatVersion, parseVersion } from '../../core/shared/pep440-version';
import { compareRpmLabels, encodeVersion } from '../../core/shared/rpm-version';
import { failCommand } from '../utils';

export interface EncodeOptions {
  strictLocal?: boolean;
}

/**
 * PEP 440 버전 → RPM 레이블 표시
 */
export async function encodeCommand(versions: string[], options: EncodeOptions): Promise<void> {
  try {
    const table = new Table({
      head: [chalk.cyan('버전'), chalk.cyan('정규화'), chalk.cyan('RPM 레이블')],
    });

    for (const version of versions) {
      const parsed = parseVersion(version);
      table.push([version, formatVersion(parsed), encodeVersion(version, { strictLocal: options.strictLocal })]);
    }

    console.log(table.toString());
  } catch (error) {
    failCommand('인코딩 실패', error);
  }
}

/**
 * PEP 440 순서로 정렬하고 인코딩된 레이블의 RPM 순서가 일치하는지 확인
 */
export async function sortCommand(versions: string[], options: EncodeOptions): Promise<void> {
  try {
    const sorted = [...versions].sort((a, b) => comparePep440Versions(a, b));
    const labels = sorted.map((version) => encodeVersion(version, { strictLocal: options.strictLocal }));

    const table = new Table({
      head: [chalk.cyan('#'), chalk.cyan('버전'), chalk.cyan('RPM 레이블'), chalk.cyan('RPM 순서')],
    });

    let mismatches = 0;
    sorted.forEach((version, i) => {
      let status = '-';
      if (i > 0) {
        const expected = comparePep440Versions(sorted[i - 1], version);
        const actual = compareRpmLabels(labels[i - 1], labels[i]);
        if (expected === actual) {
          status = chalk.green('✓');
        } else {
          status = chalk.red('✗');
          mismatches++;
        }
      }
      table.push([String(i + 1), version, labels[i], status]);
    });

    console.log(table.toString());

    if (mismatches > 0) {
      console.log(chalk.red(`\nRPM 순서가 다른 항목: ${mismatches}개`));
      process.exitCode = 1;
    } else {
      console.log(chalk.green('\n✓ RPM 순서가 PEP 440 순서와 일치합니다'));
    }
  } catch (error) {
    failCommand('정렬 실패', error);
  }
}
