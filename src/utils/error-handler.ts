/**
 * 流水线错误处理工具
 * 定义采集、处理、报告三个阶段共用的错误分类
 */

import { PipelineLogger, defaultLogger } from './logger';

export enum PipelineErrorType {
  /** 网络或认证错误，下次调度时重试 */
  SOURCE_UNAVAILABLE = 'source_unavailable',

  /** 响应无法按预期解析，本次跳过该数据源 */
  MALFORMED_RESPONSE = 'malformed_response',

  /** 单条记录不满足约束，丢弃该记录 */
  VALIDATION_ERROR = 'validation_error',

  /** 报告渲染失败，文档保持不变 */
  RENDER_ERROR = 'render_error',

  /** 配置错误 */
  CONFIGURATION_ERROR = 'configuration_error',

  /** 归档快照已存在且内容不同 */
  SNAPSHOT_CONFLICT = 'snapshot_conflict',

  /** 未知错误 */
  UNKNOWN_ERROR = 'unknown_error'
}

export interface PipelineErrorContext {
  /** 错误类型 */
  errorType: PipelineErrorType;

  /** 数据源标识 */
  source?: string;

  /** 操作名称 */
  operation?: string;

  /** 错误发生时间 */
  timestamp: Date;

  /** 错误详情 */
  details?: Record<string, unknown>;
}

export class PipelineError extends Error {
  public readonly context: PipelineErrorContext;

  constructor(
    message: string,
    errorType: PipelineErrorType,
    source?: string,
    operation?: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PipelineError';
    this.context = {
      errorType,
      source,
      operation,
      timestamp: new Date(),
      details
    };
  }

  get errorType(): PipelineErrorType {
    return this.context.errorType;
  }

  /**
   * 转换为可读字符串
   */
  toString(): string {
    return `[${this.context.errorType}] ${this.message} (Source: ${this.context.source || 'unknown'}, Operation: ${this.context.operation || 'unknown'})`;
  }
}

/**
 * 判断是否为指定类型的流水线错误
 */
export function isPipelineError(error: unknown, errorType?: PipelineErrorType): error is PipelineError {
  if (!(error instanceof PipelineError)) {
    return false;
  }
  return errorType === undefined || error.context.errorType === errorType;
}

/**
 * 将任意抛出值转换为Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class PipelineErrorHandler {
  private logger: PipelineLogger;

  constructor(logger?: PipelineLogger) {
    this.logger = logger || defaultLogger.createSubLogger('error-handler');
  }

  /**
   * 处理流水线错误，返回合并后的上下文
   */
  handleError(error: unknown, context: Partial<PipelineErrorContext> = {}): PipelineErrorContext {
    const err = toError(error);
    const errorContext: PipelineErrorContext = {
      errorType: PipelineErrorType.UNKNOWN_ERROR,
      timestamp: new Date(),
      ...context
    };

    if (err instanceof PipelineError) {
      errorContext.errorType = err.context.errorType;
      errorContext.source = err.context.source || errorContext.source;
      errorContext.operation = err.context.operation || errorContext.operation;
      errorContext.timestamp = err.context.timestamp;
      errorContext.details = {
        ...err.context.details,
        ...errorContext.details
      };
    }

    this.logError(err, errorContext);
    return errorContext;
  }

  /**
   * 按错误类型选择日志级别
   */
  private logError(error: Error, context: PipelineErrorContext): void {
    const logData: Record<string, unknown> = {
      errorType: context.errorType,
      source: context.source,
      timestamp: context.timestamp.toISOString(),
      details: context.details
    };

    switch (context.errorType) {
      case PipelineErrorType.SOURCE_UNAVAILABLE:
        this.logger.warn(`Source unavailable, will retry on next scheduled run: ${error.message}`, logData, context.operation);
        break;

      case PipelineErrorType.MALFORMED_RESPONSE:
        this.logger.warn(`Malformed response, source skipped for this run: ${error.message}`, logData, context.operation);
        break;

      case PipelineErrorType.VALIDATION_ERROR:
        this.logger.warn(`Record dropped: ${error.message}`, logData, context.operation);
        break;

      case PipelineErrorType.RENDER_ERROR:
        this.logger.error(`Report not updated: ${error.message}`, error, logData, context.operation);
        break;

      case PipelineErrorType.CONFIGURATION_ERROR:
        this.logger.fatal(`Configuration error: ${error.message}`, error, logData, context.operation);
        break;

      default:
        this.logger.error(`Pipeline error: ${error.message}`, error, logData, context.operation);
    }
  }
}

/**
 * 默认错误处理器实例
 */
export const defaultErrorHandler = new PipelineErrorHandler();
