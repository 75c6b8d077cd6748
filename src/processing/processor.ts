/**
 * 处理器
 * 读取一次采集运行暂存的原始记录，转换、清洗后写出处理结果、归档副本和最新指针
 */

import path from 'path';
import { RawStore } from '../collection/raw-store';
import { RawRecord, SourceId } from '../collection/types/raw-record';
import { SnapshotStore } from './snapshot-store';
import { DataCleaner, CleaningResult } from './data-cleaner';
import { transformRawRecord } from './transformers';
import { columnNames, schemaFor } from './schemas';
import { LatestPointer, POINTER_SCHEMA_VERSION, PointerEntry } from './types/latest-pointer';
import { ProcessedRecord } from './types/processed-record';
import { PipelineLogger, createStageLogger } from '../utils/logger';
import { PipelineError, PipelineErrorHandler, PipelineErrorType, toError } from '../utils/error-handler';
import { stringifyCsv } from '../utils/csv';
import { createRunId, isRunId, parseRunId } from '../utils/run-id';

export interface ProcessorOptions {
  /** 需要处理的数据源，按报告顺序 */
  sources: SourceId[];
  /** 是否写入归档副本 */
  enableArchive: boolean;
  /** 时钟，仅在没有任何暂存运行时使用 */
  now?: () => Date;
}

export interface SourceProcessingResult {
  source: SourceId;
  records: ProcessedRecord[];
  entry: PointerEntry;
}

export interface ProcessRunResult {
  runId: string;
  pointerPath: string;
  pointer: LatestPointer;
  results: SourceProcessingResult[];
  /** 至少一个数据源产出了记录 */
  hasData: boolean;
}

/**
 * 转换并清洗一条原始记录，纯函数，相同输入得到相同输出
 */
export function processRawRecord(raw: RawRecord, cleaner: DataCleaner = new DataCleaner()): CleaningResult {
  return cleaner.clean(transformRawRecord(raw), schemaFor(raw.source));
}

function noDataEntry(source: SourceId, reason: string): PointerEntry {
  return {
    source,
    status: 'no_data',
    path: null,
    archivePath: null,
    recordCount: 0,
    droppedCount: 0,
    reason
  };
}

export class Processor {
  private rawStore: RawStore;
  private snapshotStore: SnapshotStore;
  private options: ProcessorOptions;
  private cleaner: DataCleaner;
  private logger: PipelineLogger;
  private errorHandler: PipelineErrorHandler;

  constructor(rawStore: RawStore, snapshotStore: SnapshotStore, options: ProcessorOptions) {
    this.rawStore = rawStore;
    this.snapshotStore = snapshotStore;
    this.options = options;
    this.cleaner = new DataCleaner();
    this.logger = createStageLogger('processor');
    this.errorHandler = new PipelineErrorHandler(this.logger);
  }

  /**
   * 处理指定运行（默认最新一次）暂存的原始记录
   */
  process(requestedRunId?: string): ProcessRunResult {
    if (requestedRunId !== undefined && !isRunId(requestedRunId)) {
      throw new Error(`Invalid run id: ${requestedRunId}`);
    }

    if (requestedRunId !== undefined && !this.rawStore.hasRun(requestedRunId)) {
      throw new PipelineError(
        `Collection run ${requestedRunId} was never staged`,
        PipelineErrorType.CONFIGURATION_ERROR,
        undefined,
        'process',
        { runDir: this.rawStore.runDir(requestedRunId) }
      );
    }

    const stagedRunId = requestedRunId || this.rawStore.latestRunId();
    const runId = stagedRunId || createRunId(this.options.now ? this.options.now() : new Date());

    if (!stagedRunId) {
      this.logger.warn('No staged collection run found, every source has no data', undefined, 'process');
    } else {
      this.logger.info(`Processing collection run ${runId}`, undefined, 'process');
    }

    const results = this.options.sources.map(source =>
      stagedRunId ? this.processSource(source, stagedRunId) : { source, records: [], entry: noDataEntry(source, 'no staged collection run') }
    );

    const pointer: LatestPointer = {
      schemaVersion: POINTER_SCHEMA_VERSION,
      runId,
      runTimestamp: parseRunId(runId).toISOString(),
      sources: results.map(result => result.entry)
    };
    const pointerPath = this.snapshotStore.writePointer(pointer);
    const hasData = results.some(result => result.entry.status === 'ok');

    if (hasData) {
      this.logger.info(`Processing of run ${runId} complete, latest pointer updated`, {
        sources: results.map(result => `${result.source}:${result.entry.status}:${result.entry.recordCount}`)
      }, 'process');
    } else {
      this.logger.warn(`Run ${runId} produced no data for any source`, undefined, 'process');
    }

    return { runId, pointerPath, pointer, results, hasData };
  }

  /**
   * 处理单个数据源，失败时返回无数据结果
   */
  private processSource(source: SourceId, runId: string): SourceProcessingResult {
    const rawPath = path.join(this.rawStore.runDir(runId), `${source}.json`);

    try {
      if (!this.rawStore.listRecordFiles(runId).includes(rawPath)) {
        return { source, records: [], entry: noDataEntry(source, this.missingReason(source, runId)) };
      }

      const raw = this.rawStore.readRecord(rawPath);
      const { records, dropped } = processRawRecord(raw, this.cleaner);

      if (records.length === 0) {
        this.logger.warn(`No valid ${source} records in run ${runId}`, { dropped: dropped.length }, 'process');
        return {
          source,
          records,
          entry: { ...noDataEntry(source, 'no record passed validation'), droppedCount: dropped.length }
        };
      }

      const csv = stringifyCsv(columnNames(schemaFor(source)), records);
      const archivePath = this.options.enableArchive ? this.snapshotStore.writeArchive(runId, source, csv) : null;
      const processedPath = this.snapshotStore.writeProcessed(source, csv);

      this.logger.info(`Processed ${source} data saved to ${processedPath}`, {
        records: records.length,
        dropped: dropped.length,
        archivePath
      }, 'process');

      return {
        source,
        records,
        entry: {
          source,
          status: 'ok',
          path: processedPath,
          archivePath,
          recordCount: records.length,
          droppedCount: dropped.length,
          reason: null
        }
      };
    } catch (error) {
      const context = this.errorHandler.handleError(error, { source, operation: 'process' });
      return { source, records: [], entry: noDataEntry(source, `${context.errorType}: ${toError(error).message}`) };
    }
  }

  /**
   * 从采集清单中找出数据源缺失的原因
   */
  private missingReason(source: SourceId, runId: string): string {
    const manifest = this.rawStore.readManifest(runId);
    const outcome = manifest ? manifest.outcomes.find(item => item.source === source) : undefined;
    if (outcome && outcome.status === 'failed') {
      return `${outcome.errorType}: ${outcome.reason}`;
    }
    return 'source not collected in this run';
  }
}
