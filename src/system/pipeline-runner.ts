/**
 * 流水线运行器
 * 状态机：Idle → Collecting → Processing → Reporting → Idle，状态变化以事件发出
 */

import { EventEmitter } from 'events';
import { Collector, CollectionRunResult } from '../collection/collector';
import { RawStore } from '../collection/raw-store';
import { createSources } from '../collection/sources';
import { HttpFetcher, RequestClient } from '../collection/http/request-client';
import { Processor, ProcessRunResult } from '../processing/processor';
import { SnapshotStore } from '../processing/snapshot-store';
import { Reporter, ReportResult } from '../reporting/reporter';
import { PipelineConfig } from './config';
import { PipelineLogger, createStageLogger } from '../utils/logger';
import { PipelineErrorHandler, toError } from '../utils/error-handler';

export enum PipelineState {
  IDLE = 'idle',
  COLLECTING = 'collecting',
  PROCESSING = 'processing',
  REPORTING = 'reporting'
}

/** 允许的状态转换；任何阶段出现未预期的异常都回到空闲 */
const TRANSITIONS: Record<PipelineState, PipelineState[]> = {
  [PipelineState.IDLE]: [PipelineState.COLLECTING],
  [PipelineState.COLLECTING]: [PipelineState.PROCESSING, PipelineState.IDLE],
  [PipelineState.PROCESSING]: [PipelineState.REPORTING, PipelineState.IDLE],
  [PipelineState.REPORTING]: [PipelineState.IDLE]
};

export interface PipelineStages {
  collector: Collector;
  processor: Processor;
  reporter: Reporter;
}

export interface PipelineRunnerOptions {
  /** 报告文档路径 */
  documentPath: string;
}

export interface PipelineRunResult {
  runId: string;
  collection: CollectionRunResult;
  processing: ProcessRunResult;
  /** 报告更新失败时为null */
  report: ReportResult | null;
  reportError: string | null;
  /** 所有数据源失败或报告无法更新时为1 */
  exitCode: number;
}

export interface StateChangeEvent {
  from: PipelineState;
  to: PipelineState;
  timestamp: Date;
}

export function createSnapshotStore(config: PipelineConfig): SnapshotStore {
  return new SnapshotStore({
    processedDir: config.paths.processedDir,
    archiveDir: config.paths.archiveDir,
    latestPointerPath: config.paths.latestPointerPath
  });
}

/**
 * 按配置组装各阶段
 */
export function createPipelineStages(config: PipelineConfig, fetcher?: HttpFetcher): PipelineStages {
  const client = fetcher || new RequestClient(config.http);
  const rawStore = new RawStore(config.paths.rawDir);
  const snapshotStore = createSnapshotStore(config);

  return {
    collector: new Collector(createSources(config, client), rawStore),
    processor: new Processor(rawStore, snapshotStore, {
      sources: config.enabledSources,
      enableArchive: config.enableArchive
    }),
    reporter: new Reporter(snapshotStore, {
      sources: config.enabledSources,
      topRepositories: config.report.topRepositories
    })
  };
}

export class PipelineRunner extends EventEmitter {
  private stages: PipelineStages;
  private options: PipelineRunnerOptions;
  private state: PipelineState = PipelineState.IDLE;
  private logger: PipelineLogger;
  private errorHandler: PipelineErrorHandler;

  constructor(stages: PipelineStages, options: PipelineRunnerOptions) {
    super();
    this.stages = stages;
    this.options = options;
    this.logger = createStageLogger('runner');
    this.errorHandler = new PipelineErrorHandler(this.logger);
  }

  getState(): PipelineState {
    return this.state;
  }

  /**
   * 切换状态，非法转换抛出异常
   */
  transition(to: PipelineState): void {
    const from = this.state;
    if (!TRANSITIONS[from].includes(to)) {
      throw new Error(`Illegal pipeline transition: ${from} -> ${to}`);
    }
    this.state = to;
    this.logger.debug(`State ${from} -> ${to}`, undefined, 'transition');
    const event: StateChangeEvent = { from, to, timestamp: new Date() };
    this.emit('stateChange', event);
  }

  /**
   * 完整执行一次采集、处理和报告
   */
  async run(): Promise<PipelineRunResult> {
    this.transition(PipelineState.COLLECTING);

    try {
      const collection = await this.stages.collector.collect();
      if (collection.allFailed) {
        this.logger.error(`Every source failed in run ${collection.runId}, continuing with no data`, undefined, {
          failed: collection.failed
        }, 'run');
      }

      this.transition(PipelineState.PROCESSING);
      const processing = this.stages.processor.process(collection.runId);

      this.transition(PipelineState.REPORTING);
      let report: ReportResult | null = null;
      let reportError: string | null = null;
      try {
        report = this.stages.reporter.report(this.options.documentPath);
      } catch (error) {
        this.errorHandler.handleError(error, { operation: 'report' });
        reportError = toError(error).message;
      }

      this.transition(PipelineState.IDLE);

      const result: PipelineRunResult = {
        runId: collection.runId,
        collection,
        processing,
        report,
        reportError,
        exitCode: collection.allFailed || report === null ? 1 : 0
      };
      this.emit('runCompleted', result);
      this.logger.info(`Run ${result.runId} finished with exit code ${result.exitCode}`, undefined, 'run');
      return result;
    } catch (error) {
      this.errorHandler.handleError(error, { operation: 'run' });
      if (this.state !== PipelineState.IDLE) {
        this.transition(PipelineState.IDLE);
      }
      this.emit('runFailed', toError(error));
      throw error;
    }
  }
}
