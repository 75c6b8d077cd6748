/**
 * 采集器
 * 依次请求所有启用的数据源，把原始响应写入暂存目录；
 * 单个数据源失败只记录在清单中，不中断本次运行
 */

import { BaseSource } from './sources/base-source';
import { RawStore } from './raw-store';
import { CollectionManifest, SourceId, SourceOutcome } from './types/raw-record';
import { PipelineLogger, createStageLogger } from '../utils/logger';
import { PipelineErrorHandler } from '../utils/error-handler';
import { createRunId } from '../utils/run-id';

export interface CollectionRunResult {
  runId: string;
  manifestPath: string;
  outcomes: SourceOutcome[];
  succeeded: SourceId[];
  failed: SourceId[];
  /** 所有数据源均失败 */
  allFailed: boolean;
}

export interface CollectorOptions {
  /** 时钟，测试时可固定 */
  now?: () => Date;
}

export class Collector {
  private sources: BaseSource[];
  private store: RawStore;
  private logger: PipelineLogger;
  private errorHandler: PipelineErrorHandler;
  private now: () => Date;

  constructor(sources: BaseSource[], store: RawStore, options: CollectorOptions = {}) {
    this.sources = sources;
    this.store = store;
    this.logger = createStageLogger('collector');
    this.errorHandler = new PipelineErrorHandler(this.logger);
    this.now = options.now || (() => new Date());
  }

  /**
   * 执行一次采集运行
   */
  async collect(runId: string = createRunId(this.now())): Promise<CollectionRunResult> {
    const startedAt = this.now().toISOString();
    this.logger.info(`Starting collection run ${runId} for ${this.sources.length} sources`, undefined, 'collect');

    const outcomes: SourceOutcome[] = [];

    for (const source of this.sources) {
      outcomes.push(await this.collectSource(source, runId));
    }

    const manifest: CollectionManifest = {
      runId,
      startedAt,
      finishedAt: this.now().toISOString(),
      outcomes
    };
    const manifestPath = this.store.writeManifest(manifest);

    const succeeded = outcomes.filter(outcome => outcome.status === 'succeeded').map(outcome => outcome.source);
    const failed = outcomes.filter(outcome => outcome.status === 'failed').map(outcome => outcome.source);
    const allFailed = succeeded.length === 0;

    if (allFailed) {
      this.logger.error(`Collection run ${runId} failed: every source is unavailable`, undefined, { failed }, 'collect');
    } else {
      this.logger.info(`Collection run ${runId} complete`, { succeeded, failed }, 'collect');
    }

    return { runId, manifestPath, outcomes, succeeded, failed, allFailed };
  }

  /**
   * 采集单个数据源，失败时返回失败结果而不抛出
   */
  private async collectSource(source: BaseSource, runId: string): Promise<SourceOutcome> {
    try {
      const { record, itemCount } = await source.fetch(runId, this.now);
      const rawPath = this.store.writeRecord(record);
      this.logger.info(`Raw ${source.source} data saved to ${rawPath}`, { itemCount }, 'collect');
      return {
        source: source.source,
        status: 'succeeded',
        rawPath,
        itemCount,
        collectedAt: record.collectedAt
      };
    } catch (error) {
      const context = this.errorHandler.handleError(error, { source: source.source, operation: 'collect' });
      return {
        source: source.source,
        status: 'failed',
        errorType: context.errorType,
        reason: error instanceof Error ? error.message : String(error),
        failedAt: context.timestamp.toISOString()
      };
    }
  }
}
