/**
 * 数据源基类
 * 负责请求数据源并把响应包装为原始记录
 */

import { PipelineLogger, createSourceLogger } from '../../utils/logger';
import { PipelineError, PipelineErrorType } from '../../utils/error-handler';
import { HttpFetcher } from '../http/request-client';
import { RawRecord, SourceId } from '../types/raw-record';

export interface BaseSourceConfig {
  /** 数据源标识 */
  source: SourceId;
  /** 数据源展示名称 */
  name: string;
}

/** 单次抓取的结果 */
export interface FetchResult {
  /** 请求的端点 */
  endpoint: string;
  /** 响应正文 */
  payload: unknown;
  /** 响应中包含的条目数 */
  itemCount: number;
}

export interface SourceFetch {
  record: RawRecord;
  itemCount: number;
}

export abstract class BaseSource {
  protected config: BaseSourceConfig;
  protected logger: PipelineLogger;
  protected fetcher: HttpFetcher;

  constructor(config: BaseSourceConfig, fetcher: HttpFetcher) {
    this.config = config;
    this.fetcher = fetcher;
    this.logger = createSourceLogger(config.source);
  }

  get source(): SourceId {
    return this.config.source;
  }

  get name(): string {
    return this.config.name;
  }

  /**
   * 抓取数据并生成原始记录
   */
  async fetch(runId: string, now: () => Date = () => new Date()): Promise<SourceFetch> {
    const startTime = Date.now();
    this.logger.info(`Fetching ${this.config.name}...`, undefined, 'fetch');

    const result = await this.executeFetch();

    this.logger.info(`Fetched ${result.itemCount} items in ${Date.now() - startTime}ms`, undefined, 'fetch');

    return {
      record: {
        source: this.config.source,
        sourceName: this.config.name,
        runId,
        collectedAt: now().toISOString(),
        endpoint: result.endpoint,
        payload: result.payload
      },
      itemCount: result.itemCount
    };
  }

  /**
   * 构造响应格式错误
   */
  protected malformed(message: string, details?: Record<string, unknown>): PipelineError {
    return new PipelineError(message, PipelineErrorType.MALFORMED_RESPONSE, this.config.source, 'fetch', details);
  }

  /**
   * 子类实现具体请求与响应格式检查
   */
  protected abstract executeFetch(): Promise<FetchResult>;
}
