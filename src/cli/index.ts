#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { getConfigManager } from '../core/config';
import logger from '../utils/logger';
import { collectOption, failCommand } from './utils';

// 버전 정보
const VERSION = '0.3.0';

// 메인 프로그램
const program = new Command();

program
  .name('pep2rpm')
  .description(chalk.cyan('pep2rpm - Python 의존성(PEP 440/508)을 RPM 의존성으로 변환'))
  .version(VERSION, '-v, --version', '버전 정보 표시')
  .helpOption('-h, --help', '도움말 표시')
  .option('--debug', '디버그 로그 출력')
  .option('--log-file', '~/.pep2rpm/logs 에 로그 파일 기록');

// 로깅 설정
program.hook('preAction', async () => {
  const { debug, logFile } = program.opts();
  const level = debug ? 'debug' : getConfigManager().getConfig().logLevel;
  if (logFile) {
    await logger.initialize(level);
  } else {
    logger.setLevel(level);
  }
});

// 변환 옵션 공통
function addConversionOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', '추가 설정 파일 (JSON)')
    .option('--rpm-versions', 'RPM 순서 보존 인코딩으로 버전 표기')
    .option('--strict-local', '숫자/문자 혼합 로컬 세그먼트를 오류로 처리')
    .option('--template <template>', "패키지 capability 템플릿 (예: 'python3-{name}')")
    .option('--env <key=value>', '변환 시점 마커 변수 값 (반복 가능)', collectOption);
}

// convert 명령어
addConversionOptions(
  program
    .command('convert')
    .description('요구사항을 RPM 의존성 절로 변환')
    .argument('[requirements...]', "요구사항 (예: 'requests>=2.20; python_version < \"3.8\"')")
    .option('-f, --file <path>', '요구사항 파일 (requirements.txt)')
    .option('-e, --extras <list>', '활성화할 extras (쉼표 구분)')
    .option('-t, --tag <name>', '한 줄의 태그로 출력 (예: Requires)')
).action(async (requirements, options) => {
  const { convertCommand } = await import('./commands/convert');
  await convertCommand(requirements, options);
});

// encode 명령어
program
  .command('encode')
  .description('PEP 440 버전을 RPM 레이블로 인코딩')
  .argument('<versions...>', '버전 목록')
  .option('--strict-local', '숫자/문자 혼합 로컬 세그먼트를 오류로 처리')
  .action(async (versions, options) => {
    const { encodeCommand } = await import('./commands/encode');
    await encodeCommand(versions, options);
  });

// sort 명령어
program
  .command('sort')
  .description('PEP 440 순서로 정렬하고 RPM 순서와 비교')
  .argument('<versions...>', '버전 목록')
  .option('--strict-local', '숫자/문자 혼합 로컬 세그먼트를 오류로 처리')
  .action(async (versions, options) => {
    const { sortCommand } = await import('./commands/encode');
    await sortCommand(versions, options);
  });

// tags 명령어
addConversionOptions(
  program
    .command('tags')
    .description('메타데이터에서 BuildRequires/Requires/Suggests 태그 생성')
    .argument('<metadata>', 'METADATA, PKG-INFO 또는 JSON 파일')
    .option('-b, --build-requires <requirement>', '빌드 의존성 추가 (반복 가능)', collectOption)
    .option('-p, --python-version <specifier>', 'python(abi) 지정자 (Requires-Python 대신 사용)')
).action(async (metadata, options) => {
  const { tagsCommand } = await import('./commands/tags');
  await tagsCommand(metadata, options);
});

// config 명령어
program
  .command('config')
  .description('설정 관리')
  .addCommand(
    new Command('get')
      .description('설정값 조회')
      .argument('[key]', '설정 키')
      .action(async (key) => {
        const { configGet } = await import('./commands/config');
        await configGet(key);
      })
  )
  .addCommand(
    new Command('set')
      .description('설정값 변경 (JSON 값 또는 문자열)')
      .argument('<key>', '설정 키')
      .argument('<value>', '설정값')
      .action(async (key, value) => {
        const { configSet } = await import('./commands/config');
        await configSet(key, value);
      })
  )
  .addCommand(
    new Command('list')
      .description('모든 설정 표시')
      .action(async () => {
        const { configList } = await import('./commands/config');
        await configList();
      })
  )
  .addCommand(
    new Command('reset')
      .description('설정 초기화')
      .action(async () => {
        const { configReset } = await import('./commands/config');
        await configReset();
      })
  );

// 에러 핸들링
program.exitOverride((err) => {
  if (err.code === 'commander.help' || err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  console.error(chalk.red(`오류: ${err.message}`));
  process.exit(1);
});

// 명령어가 없으면 도움말 표시
if (process.argv.length <= 2) {
  console.log(chalk.cyan('\n  pep2rpm - Python 의존성을 RPM 의존성으로 변환\n'));
  console.log('  사용법: pep2rpm <명령어> [옵션]\n');
  console.log('  명령어:');
  console.log('    convert     요구사항 → RPM 의존성 절');
  console.log('    encode      PEP 440 버전 → RPM 레이블');
  console.log('    sort        PEP 440 정렬과 RPM 순서 비교');
  console.log('    tags        메타데이터 → 의존성 태그');
  console.log('    config      설정 관리');
  console.log('\n  예시:');
  console.log(chalk.gray("    pep2rpm convert 'requests>=2.20' 'enum34; python_version < \"3.4\"'"));
  console.log(chalk.gray('    pep2rpm convert -f requirements.txt -e socks --tag Requires'));
  console.log(chalk.gray('    pep2rpm encode 1.0a1 1.0.dev1 1.0.post1'));
  console.log(chalk.gray('    pep2rpm tags dist-info/METADATA -p ">=3.8"'));
  console.log('\n  자세한 내용: pep2rpm --help\n');
} else {
  // 파싱 및 실행
  program.parseAsync(process.argv).catch((error: unknown) => failCommand('오류', error));
}
