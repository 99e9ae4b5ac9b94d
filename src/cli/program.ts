import { Command, InvalidArgumentError } from 'commander';
import path from 'path';
import { clampWorkers, loadCheckerConfig, type ICheckerConfig } from '../config/CheckerConfig';
import type { IReport } from '../models';
import { ServiceFactory, type IServiceOverrides } from '../patterns/factory/ServiceFactory';
import { createProgressLogger } from '../services/DomainCheckEngine';
import { DomainIndexBuilder, loadDomainSource } from '../services/DomainIndexBuilder';
import { buildReport, formatSummary } from '../services/ReportBuilder';
import { describeError } from '../utils/errors';
import { logger, setLogLevel } from '../utils/logger';
import { writeReport } from '../utils/ReportWriter';

export const DEFAULT_OUTPUT = 'domain_results.json';
export const DEFAULT_SOURCE = path.join('data', 'domains-by-year.json');

export interface ICliOptions {
  year?: number;
  workers?: number;
  output: string;
  quick: boolean;
  source: string;
  verbose: boolean;
}

export interface IRunDependencies extends IServiceOverrides {
  /** Where the report goes (defaults to a JSON file on disk) */
  writer?: (outputPath: string, report: IReport) => Promise<void>;
  /** Where summary lines go (defaults to stdout) */
  print?: (line: string) => void;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

/**
 * Command-line definition
 */
export function createProgram(): Command {
  return new Command()
    .name('domain-checker')
    .description('Check historical domains for parking, sale, expiry and availability, and score them')
    .version('1.0.0')
    .option('--year <year>', 'only check domains from this year', parseInteger)
    .option('-w, --workers <n>', 'number of concurrent workers (1-50)', parseInteger)
    .option('-o, --output <path>', 'output JSON file path', DEFAULT_OUTPUT)
    .option('--quick', 'only check the first 5 domains per year', false)
    .option('-s, --source <path>', 'domain-year JSON source list', DEFAULT_SOURCE)
    .option('-v, --verbose', 'enable debug logging', false)
    .addHelpText(
      'after',
      [
        '',
        'Examples:',
        '  domain-checker                        # check all domains',
        '  domain-checker --year 2005            # check only 2005 domains',
        '  domain-checker --quick                # quick test (5 per year)',
        '  domain-checker --workers 20 -o out.json'
      ].join('\n')
    );
}

/**
 * Parse command-line arguments (without the node and script entries)
 */
export function parseCliOptions(args: readonly string[], program: Command = createProgram()): ICliOptions {
  program.parse([...args], { from: 'user' });
  return program.opts<ICliOptions>();
}

/**
 * Build the index, check every domain, write the report and print the summary
 * @returns The report, or undefined when there was nothing to check
 */
export async function runChecker(
  options: ICliOptions,
  config: ICheckerConfig,
  dependencies: IRunDependencies = {}
): Promise<IReport | undefined> {
  const writer = dependencies.writer ?? writeReport;
  const print = dependencies.print ?? ((line: string) => console.log(line));

  const source = await loadDomainSource(options.source);
  logger.info('Building domain index...');
  const records = new DomainIndexBuilder().build(source, {
    ...(options.year !== undefined && { year: options.year }),
    quick: options.quick
  });

  if (records.length === 0) {
    logger.warn(`No domains to check. Verify ${options.source} and filters.`);
    return undefined;
  }

  const runConfig: ICheckerConfig = {
    ...config,
    workers: clampWorkers(options.workers ?? config.workers)
  };
  const factory = new ServiceFactory(runConfig);
  const engine = factory.createEngine(factory.createCheckService(dependencies), createProgressLogger(records.length));

  logger.info(
    `Checking ${records.length} unique domains with ${engine.getWorkers()} workers${options.quick ? ' (quick mode)' : ''}...`
  );
  const outcome = await engine.run(records);

  const report = buildReport(outcome.results);
  await writer(options.output, report);
  logger.info(`Results written to ${options.output}`);

  formatSummary(report.summary, outcome.failedDomains).forEach((line) => print(line));
  return report;
}

/**
 * CLI entry point
 * @param args - Arguments after the node and script entries
 * @returns Process exit code
 */
export async function main(args: readonly string[]): Promise<number> {
  const options = parseCliOptions(args);

  try {
    const config = loadCheckerConfig();
    setLogLevel(options.verbose ? 'debug' : config.logLevel);
    await runChecker(options, config);
    return 0;
  } catch (error) {
    logger.error(describeError(error));
    return 1;
  }
}
