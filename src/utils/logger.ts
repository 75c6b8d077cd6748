/**
 * 流水线日志系统
 * 提供结构化的日志记录功能
 */

import fs from 'fs';
import path from 'path';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal'
}

export interface LogEntry {
  /** 日志级别 */
  level: LogLevel;

  /** 日志消息 */
  message: string;

  /** 模块名称 */
  module: string;

  /** 操作名称 */
  operation?: string;

  /** 时间戳 */
  timestamp: Date;

  /** 额外数据 */
  data?: Record<string, unknown>;

  /** 错误对象 */
  error?: Error;
}

export interface LoggerOptions {
  /** 最小日志级别 */
  minLevel?: LogLevel;

  /** 是否启用控制台输出 */
  consoleOutput?: boolean;

  /** 文件输出路径，未设置时不写文件 */
  filePath?: string;

  /** 模块名称 */
  moduleName?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
  [LogLevel.FATAL]: 4
};

/**
 * 解析日志级别字符串，无法识别时返回默认级别
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  const normalized = (value || '').trim().toLowerCase();
  const match = Object.values(LogLevel).find(level => level === normalized);
  return match || fallback;
}

interface LoggerSettings {
  minLevel: LogLevel;
  consoleOutput: boolean;
  filePath?: string;
}

export class PipelineLogger {
  /** 级别与输出配置，父子日志器共享同一对象 */
  private settings: LoggerSettings;
  private moduleName: string;

  constructor(options: LoggerOptions = {}, sharedSettings?: LoggerSettings) {
    this.settings = sharedSettings || {
      minLevel: options.minLevel || LogLevel.INFO,
      consoleOutput: options.consoleOutput !== false,
      filePath: options.filePath
    };
    this.moduleName = options.moduleName || 'pipeline';
  }

  /**
   * 记录调试日志
   */
  debug(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.DEBUG, message, data, operation);
  }

  /**
   * 记录信息日志
   */
  info(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.INFO, message, data, operation);
  }

  /**
   * 记录警告日志
   */
  warn(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.WARN, message, data, operation);
  }

  /**
   * 记录错误日志
   */
  error(message: string, error?: Error, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.ERROR, message, data, operation, error);
  }

  /**
   * 记录致命错误日志
   */
  fatal(message: string, error?: Error, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.FATAL, message, data, operation, error);
  }

  /**
   * 调整日志配置（级别、文件输出）
   */
  configure(options: Omit<LoggerOptions, 'moduleName'>): void {
    if (options.minLevel) {
      this.settings.minLevel = options.minLevel;
    }
    if (options.consoleOutput !== undefined) {
      this.settings.consoleOutput = options.consoleOutput;
    }
    if ('filePath' in options) {
      this.settings.filePath = options.filePath || undefined;
    }
  }

  /**
   * 通用日志记录方法
   */
  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    operation?: string,
    error?: Error
  ): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.settings.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      module: this.moduleName,
      operation,
      timestamp: new Date(),
      data,
      error
    };

    const line = this.format(entry);

    if (this.settings.consoleOutput) {
      this.writeToConsole(entry.level, line);
    }

    if (this.settings.filePath) {
      this.writeToFile(this.settings.filePath, line);
    }
  }

  /**
   * 格式化日志条目
   */
  private format(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const levelStr = entry.level.toUpperCase().padEnd(5);
    const moduleStr = `[${entry.module}]`;
    const operationStr = entry.operation ? `[${entry.operation}]` : '';

    let logMessage = `${timestamp} ${levelStr} ${moduleStr}${operationStr} ${entry.message}`;

    if (entry.error) {
      logMessage += `\nError: ${entry.error.message}`;
      if (entry.error.stack && this.settings.minLevel === LogLevel.DEBUG) {
        logMessage += `\nStack: ${entry.error.stack}`;
      }
    }

    if (entry.data && Object.keys(entry.data).length > 0) {
      logMessage += `\nData: ${JSON.stringify(entry.data, null, 2)}`;
    }

    return logMessage;
  }

  /**
   * 写入控制台
   */
  private writeToConsole(level: LogLevel, logMessage: string): void {
    switch (level) {
      case LogLevel.DEBUG:
        console.debug(logMessage);
        break;
      case LogLevel.INFO:
        console.info(logMessage);
        break;
      case LogLevel.WARN:
        console.warn(logMessage);
        break;
      case LogLevel.ERROR:
      case LogLevel.FATAL:
        console.error(logMessage);
        break;
    }
  }

  /**
   * 追加写入日志文件
   */
  private writeToFile(filePath: string, logMessage: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.appendFileSync(filePath, `${logMessage}\n`, 'utf8');
  }

  /**
   * 创建子模块日志器，子日志器与父日志器共享级别和输出配置
   */
  createSubLogger(moduleName: string): PipelineLogger {
    return new PipelineLogger({ moduleName: `${this.moduleName}.${moduleName}` }, this.settings);
  }
}

/**
 * 默认日志器实例
 */
export const defaultLogger = new PipelineLogger({
  minLevel: parseLogLevel(process.env.LOG_LEVEL),
  filePath: process.env.LOG_FILE || undefined
});

/**
 * 创建数据源日志器
 */
export function createSourceLogger(source: string): PipelineLogger {
  return defaultLogger.createSubLogger(`source.${source}`);
}

/**
 * 创建流水线阶段日志器
 */
export function createStageLogger(stage: 'collector' | 'processor' | 'reporter' | 'runner' | 'config'): PipelineLogger {
  return defaultLogger.createSubLogger(stage);
}
