#!/usr/bin/env node

/**
 * 流水线命令行工具
 * collect / process / report 单独执行各阶段，run 依次执行全部阶段，status 查看最新处理结果
 */

import { Command } from 'commander';
import { Table } from 'console-table-printer';
import chalk from 'chalk';
import { ConfigManager, PipelineConfig } from './config';
import { PipelineRunner, StateChangeEvent, createPipelineStages, createSnapshotStore } from './pipeline-runner';
import { HttpFetcher } from '../collection/http/request-client';
import { SourceOutcome } from '../collection/types/raw-record';
import { LatestPointer } from '../processing/types/latest-pointer';
import { toError } from '../utils/error-handler';

export interface CliDependencies {
  /** 加载配置，默认读取.env与环境变量 */
  loadConfig: () => PipelineConfig;
  /** 替换HTTP请求实现 */
  fetcher?: HttpFetcher;
}

const defaultDependencies: CliDependencies = {
  loadConfig: () => ConfigManager.getInstance().getConfig()
};

function fail(message: string, error: unknown): void {
  console.error(chalk.red(`✗ ${message}:`), toError(error).message);
  process.exitCode = 1;
}

function printOutcomes(outcomes: SourceOutcome[]): void {
  for (const outcome of outcomes) {
    if (outcome.status === 'succeeded') {
      console.log(chalk.green(`  ✓ ${outcome.source}: ${outcome.itemCount} items`));
    } else {
      console.log(chalk.red(`  ✗ ${outcome.source}: ${outcome.errorType} ${outcome.reason}`));
    }
  }
}

function printPointerTable(pointer: LatestPointer): void {
  const table = new Table({
    columns: [
      { name: 'source', title: 'Source', alignment: 'left' },
      { name: 'status', title: 'Status', alignment: 'left' },
      { name: 'records', title: 'Records', alignment: 'right' },
      { name: 'dropped', title: 'Dropped', alignment: 'right' },
      { name: 'detail', title: 'File / Reason', alignment: 'left' }
    ]
  });

  for (const entry of pointer.sources) {
    table.addRow({
      source: entry.source,
      status: entry.status,
      records: entry.recordCount,
      dropped: entry.droppedCount,
      detail: entry.status === 'ok' ? entry.path : entry.reason
    }, { color: entry.status === 'ok' ? 'green' : 'yellow' });
  }

  table.printTable();
}

export function createProgram(dependencies: CliDependencies = defaultDependencies): Command {
  const program = new Command();

  program
    .name('data-pipeline')
    .description('Scheduled ETL pipeline: collect, process and report public data')
    .version('1.0.0');

  program
    .command('collect')
    .description('Fetch every enabled source into the raw staging area')
    .action(async () => {
      try {
        const config = dependencies.loadConfig();
        const { collector } = createPipelineStages(config, dependencies.fetcher);
        console.log(chalk.blue('Collecting data...'));

        const result = await collector.collect();
        printOutcomes(result.outcomes);

        if (result.allFailed) {
          console.error(chalk.red(`✗ Every source failed in run ${result.runId}`));
          process.exitCode = 1;
          return;
        }
        console.log(chalk.green(`✓ Run ${result.runId} staged at ${result.manifestPath}`));
      } catch (error) {
        fail('Collection failed', error);
      }
    });

  program
    .command('process')
    .description('Clean and store a staged run, then update the latest pointer')
    .option('-r, --run <runId>', 'staged run to process (defaults to the latest)')
    .action((options: { run?: string }) => {
      try {
        const config = dependencies.loadConfig();
        const { processor } = createPipelineStages(config, dependencies.fetcher);
        const result = processor.process(options.run);

        if (!result.hasData) {
          console.error(chalk.red(`✗ Run ${result.runId} produced no data`));
          process.exitCode = 1;
          return;
        }
        console.log(chalk.green(`✓ Run ${result.runId} processed, latest pointer at ${result.pointerPath}`));
      } catch (error) {
        fail('Processing failed', error);
      }
    });

  program
    .command('report')
    .description('Rewrite the generated sections of the report document')
    .option('-d, --document <path>', 'report document to update')
    .action((options: { document?: string }) => {
      try {
        const config = dependencies.loadConfig();
        const { reporter } = createPipelineStages(config, dependencies.fetcher);
        const result = reporter.report(options.document || config.paths.reportPath);

        const state = result.changed ? 'updated' : 'already up to date';
        console.log(chalk.green(`✓ ${result.documentPath} ${state} (run ${result.runId})`));
      } catch (error) {
        fail('Report update failed', error);
      }
    });

  program
    .command('run')
    .description('Collect, process and report in one run')
    .action(async () => {
      try {
        const config = dependencies.loadConfig();
        const runner = new PipelineRunner(createPipelineStages(config, dependencies.fetcher), {
          documentPath: config.paths.reportPath
        });
        runner.on('stateChange', (event: StateChangeEvent) => {
          console.log(chalk.blue(`→ ${event.to}`));
        });

        const result = await runner.run();
        printOutcomes(result.collection.outcomes);

        if (result.reportError) {
          console.error(chalk.red(`✗ Report not updated: ${result.reportError}`));
        }
        if (result.exitCode !== 0) {
          process.exitCode = result.exitCode;
          return;
        }
        console.log(chalk.green(`✓ Run ${result.runId} complete`));
      } catch (error) {
        fail('Pipeline run failed', error);
      }
    });

  program
    .command('status')
    .description('Show the latest processed run')
    .option('--json', 'print the latest pointer as JSON')
    .action((options: { json?: boolean }) => {
      try {
        const config = dependencies.loadConfig();
        const pointer = createSnapshotStore(config).readPointer();

        if (!pointer) {
          console.log(chalk.yellow('No processed run yet'));
          return;
        }
        if (options.json) {
          console.log(JSON.stringify(pointer, null, 2));
          return;
        }

        console.log(chalk.blue(`Run ${pointer.runId} (${pointer.runTimestamp})`));
        printPointerTable(pointer);
      } catch (error) {
        fail('Status unavailable', error);
      }
    });

  return program;
}

if (require.main === module) {
  const program = createProgram();
  if (process.argv.length <= 2) {
    program.help();
  } else {
    program.parseAsync(process.argv).catch((error: unknown) => fail('Command failed', error));
  }
}
