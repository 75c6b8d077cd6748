/**
 * 数据清洗器
 * 负责类型转换、取值校验和按自然键去重；不合格记录记录日志后丢弃
 */

import { CandidateRecord, ColumnDefinition, FieldValue, ProcessedRecord, RecordSchema } from './types/processed-record';
import { PipelineLogger, createStageLogger } from '../utils/logger';
import { PipelineError, PipelineErrorHandler, PipelineErrorType } from '../utils/error-handler';
import { toNumber } from './transformers/helpers';

export interface DataCleanerConfig {
  /** 是否按自然键去重 */
  enableDeduplication: boolean;
  /** 是否规范化文本（去除换行与多余空白） */
  normalizeText: boolean;
}

export interface DroppedRecord {
  /** 在候选列表中的位置 */
  index: number;
  /** 丢弃原因 */
  reason: string;
}

export interface CleaningResult {
  /** 通过校验的记录，保持原始顺序 */
  records: ProcessedRecord[];
  /** 未通过校验的记录 */
  dropped: DroppedRecord[];
  /** 因自然键重复而去掉的记录数 */
  duplicateCount: number;
}

function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export class DataCleaner {
  private config: DataCleanerConfig;
  private logger: PipelineLogger;
  private errorHandler: PipelineErrorHandler;

  constructor(config: Partial<DataCleanerConfig> = {}) {
    this.config = {
      enableDeduplication: true,
      normalizeText: true,
      ...config
    };

    this.logger = createStageLogger('processor').createSubLogger('data-cleaner');
    this.errorHandler = new PipelineErrorHandler(this.logger);
  }

  /**
   * 清洗一个数据源的全部候选记录
   */
  clean(candidates: CandidateRecord[], schema: RecordSchema): CleaningResult {
    const records: ProcessedRecord[] = [];
    const dropped: DroppedRecord[] = [];
    const seenKeys = new Set<string>();
    let duplicateCount = 0;

    candidates.forEach((candidate, index) => {
      let record: ProcessedRecord;
      try {
        record = this.validate(candidate, schema, index);
      } catch (error) {
        this.errorHandler.handleError(error, { source: schema.source, operation: 'validate' });
        dropped.push({ index, reason: error instanceof Error ? error.message : String(error) });
        return;
      }

      if (this.config.enableDeduplication) {
        const key = String(record[schema.naturalKey]);
        if (seenKeys.has(key)) {
          duplicateCount++;
          this.logger.debug(`Duplicate ${schema.naturalKey} dropped: ${key}`, { index }, 'deduplicate');
          return;
        }
        seenKeys.add(key);
      }

      records.push(record);
    });

    this.logger.info(`Cleaned ${schema.source} records`, {
      candidates: candidates.length,
      kept: records.length,
      dropped: dropped.length,
      duplicates: duplicateCount
    }, 'clean');

    return { records, dropped, duplicateCount };
  }

  /**
   * 按结构转换并校验单条记录，失败时抛出校验错误
   */
  validate(candidate: CandidateRecord, schema: RecordSchema, index: number = 0): ProcessedRecord {
    const record: ProcessedRecord = {};
    for (const column of schema.columns) {
      record[column.name] = this.coerceField(candidate[column.name], column, schema, index);
    }
    return record;
  }

  private coerceField(value: unknown, column: ColumnDefinition, schema: RecordSchema, index: number): FieldValue {
    const fail = (reason: string): PipelineError => new PipelineError(
      `Record ${index} field "${column.name}" ${reason}`,
      PipelineErrorType.VALIDATION_ERROR,
      schema.source,
      'validate',
      { index, field: column.name, value: value === undefined ? null : value }
    );

    if (value === undefined || value === null) {
      throw fail('is missing');
    }

    if (column.kind === 'string') {
      if (typeof value !== 'string' && typeof value !== 'number') {
        throw fail('is not text');
      }
      const text = this.config.normalizeText ? normalizeWhitespace(String(value)) : String(value);
      if (text === '') {
        throw fail('is empty');
      }
      return text;
    }

    const numeric = toNumber(value);
    if (numeric === undefined) {
      throw fail(`is not a number (${JSON.stringify(value)})`);
    }
    if (column.kind === 'integer' && !Number.isInteger(numeric)) {
      throw fail(`is not an integer (${numeric})`);
    }
    if (column.min !== undefined && numeric < column.min) {
      throw fail(`is below ${column.min} (${numeric})`);
    }
    if (column.max !== undefined && numeric > column.max) {
      throw fail(`is above ${column.max} (${numeric})`);
    }
    return numeric;
  }
}
