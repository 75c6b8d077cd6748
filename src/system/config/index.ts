/**
 * 流水线配置管理
 * 默认值 + 环境变量覆盖（由dotenv加载.env）
 */

import path from 'path';
import dotenv from 'dotenv';
import { SourceId, ALL_SOURCES, isSourceId } from '../../collection/types/raw-record';
import { LogLevel, parseLogLevel, defaultLogger } from '../../utils/logger';
import { PipelineError, PipelineErrorType } from '../../utils/error-handler';

export type Environment = Record<string, string | undefined>;

export interface PathConfig {
  /** 数据根目录 */
  dataDir: string;
  /** 原始数据暂存目录 */
  rawDir: string;
  /** 处理结果目录 */
  processedDir: string;
  /** 历史归档目录 */
  archiveDir: string;
  /** 最新处理结果指针文件 */
  latestPointerPath: string;
  /** 报告文档 */
  reportPath: string;
}

export interface GithubTrendingSourceConfig {
  endpoint: string;
  /** 搜索条件 */
  query: string;
  perPage: number;
  /** 可选访问令牌，提高速率限制 */
  token?: string;
}

export interface WeatherSourceConfig {
  /** 基础地址，城市名拼接在路径上 */
  endpoint: string;
  cities: string[];
}

export interface CryptoSourceConfig {
  endpoint: string;
  coins: string[];
  vsCurrency: string;
  apiKey?: string;
}

export interface PipelineConfig {
  paths: PathConfig;
  /** 是否写入按日期归档的副本 */
  enableArchive: boolean;
  enabledSources: SourceId[];
  http: {
    /** 单个请求超时（毫秒） */
    timeout: number;
    userAgent: string;
  };
  sources: {
    githubTrending: GithubTrendingSourceConfig;
    weather: WeatherSourceConfig;
    crypto: CryptoSourceConfig;
  };
  report: {
    /** 报告中展示的仓库数量 */
    topRepositories: number;
  };
  logging: {
    level: LogLevel;
    file?: string;
  };
}

const DEFAULT_CITIES = ['Vancouver', 'Toronto', 'Seattle', 'San Francisco', 'New York'];
const DEFAULT_COINS = ['bitcoin', 'ethereum', 'cardano', 'solana', 'polkadot'];

function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

function parseInteger(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new PipelineError(
      `${name} must be an integer, got "${value}"`,
      PipelineErrorType.CONFIGURATION_ERROR,
      undefined,
      'loadConfig',
      { name, value }
    );
  }
  return parsed;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return !['false', '0', 'no', 'off'].includes(value.trim().toLowerCase());
}

/**
 * 由环境变量构建配置
 */
export function buildConfig(env: Environment = process.env): PipelineConfig {
  const dataDir = env.DATA_DIR || './data';
  const processedDir = env.PROCESSED_DIR || path.join(dataDir, 'processed');

  const sourceNames: string[] = splitList(env.ENABLED_SOURCES) || [...ALL_SOURCES];
  const unknownSources = sourceNames.filter(name => !isSourceId(name));
  if (unknownSources.length > 0) {
    throw new PipelineError(
      `Unknown sources in ENABLED_SOURCES: ${unknownSources.join(', ')}`,
      PipelineErrorType.CONFIGURATION_ERROR,
      undefined,
      'loadConfig',
      { known: ALL_SOURCES }
    );
  }

  const config: PipelineConfig = {
    paths: {
      dataDir,
      rawDir: env.RAW_DIR || path.join(dataDir, 'raw'),
      processedDir,
      archiveDir: env.ARCHIVE_DIR || path.join(dataDir, 'archive'),
      latestPointerPath: env.LATEST_POINTER_PATH || path.join(processedDir, 'latest.json'),
      reportPath: env.REPORT_PATH || './README.md'
    },
    enableArchive: parseBoolean(env.ENABLE_ARCHIVE, true),
    enabledSources: ALL_SOURCES.filter(source => sourceNames.includes(source)),
    http: {
      timeout: parseInteger('REQUEST_TIMEOUT_MS', env.REQUEST_TIMEOUT_MS, 10000),
      userAgent: env.HTTP_USER_AGENT || 'daily-data-pipeline/1.0'
    },
    sources: {
      githubTrending: {
        endpoint: env.GITHUB_API_URL || 'https://api.github.com/search/repositories',
        query: env.GITHUB_QUERY || 'stars:>1000',
        perPage: parseInteger('GITHUB_PER_PAGE', env.GITHUB_PER_PAGE, 10),
        token: env.GITHUB_TOKEN || undefined
      },
      weather: {
        endpoint: env.WEATHER_API_URL || 'https://wttr.in',
        cities: splitList(env.WEATHER_CITIES) || DEFAULT_CITIES
      },
      crypto: {
        endpoint: env.COINGECKO_API_URL || 'https://api.coingecko.com/api/v3/simple/price',
        coins: splitList(env.CRYPTO_COINS) || DEFAULT_COINS,
        vsCurrency: 'usd',
        apiKey: env.COINGECKO_API_KEY || undefined
      }
    },
    report: {
      topRepositories: parseInteger('REPORT_TOP_REPOSITORIES', env.REPORT_TOP_REPOSITORIES, 5)
    },
    logging: {
      level: parseLogLevel(env.LOG_LEVEL),
      file: env.LOG_FILE || undefined
    }
  };

  validateConfig(config);
  return config;
}

/**
 * 校验配置取值范围
 */
export function validateConfig(config: PipelineConfig): void {
  const problems: string[] = [];

  if (config.enabledSources.length === 0) {
    problems.push('at least one source must be enabled');
  }
  if (config.http.timeout <= 0) {
    problems.push('REQUEST_TIMEOUT_MS must be positive');
  }
  if (config.sources.githubTrending.perPage < 1 || config.sources.githubTrending.perPage > 100) {
    problems.push('GITHUB_PER_PAGE must be between 1 and 100');
  }
  if (config.enabledSources.includes(SourceId.WEATHER) && config.sources.weather.cities.length === 0) {
    problems.push('WEATHER_CITIES must name at least one city');
  }
  if (config.enabledSources.includes(SourceId.CRYPTO) && config.sources.crypto.coins.length === 0) {
    problems.push('CRYPTO_COINS must name at least one coin');
  }
  if (config.report.topRepositories < 1) {
    problems.push('REPORT_TOP_REPOSITORIES must be at least 1');
  }

  if (problems.length > 0) {
    throw new PipelineError(
      `Invalid configuration: ${problems.join('; ')}`,
      PipelineErrorType.CONFIGURATION_ERROR,
      undefined,
      'validateConfig',
      { problems }
    );
  }
}

/**
 * 配置管理器
 */
export class ConfigManager {
  private static instance: ConfigManager | null = null;
  private config: PipelineConfig;

  constructor(env: Environment = process.env) {
    this.config = buildConfig(env);
  }

  /**
   * 获取单例实例，首次调用时加载.env
   */
  public static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      dotenv.config();
      ConfigManager.instance = new ConfigManager(process.env);
      ConfigManager.instance.applyLogging();
    }
    return ConfigManager.instance;
  }

  getConfig(): PipelineConfig {
    return this.config;
  }

  /**
   * 以覆盖项更新配置并重新校验
   */
  updateConfig(updates: Partial<PipelineConfig>): void {
    const next = { ...this.config, ...updates };
    validateConfig(next);
    this.config = next;
  }

  /**
   * 将日志配置应用到默认日志器
   */
  applyLogging(): void {
    defaultLogger.configure({
      minLevel: this.config.logging.level,
      filePath: this.config.logging.file
    });
  }
}
