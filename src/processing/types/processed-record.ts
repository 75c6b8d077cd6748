/**
 * 处理后记录数据模型
 */

import { SourceId } from '../../collection/types/raw-record';

/** 字段取值 */
export type FieldValue = string | number;

/** 经过校验的处理后记录 */
export type ProcessedRecord = Record<string, FieldValue>;

/** 转换器输出的候选记录，尚未校验 */
export type CandidateRecord = Record<string, unknown>;

export type ColumnKind = 'string' | 'integer' | 'number';

export interface ColumnDefinition {
  /** 列名 */
  name: string;
  /** 取值类型 */
  kind: ColumnKind;
  /** 数值下限（含） */
  min?: number;
  /** 数值上限（含） */
  max?: number;
}

export interface RecordSchema {
  source: SourceId;
  /** 去重使用的自然键 */
  naturalKey: string;
  columns: ColumnDefinition[];
}

/** 热门仓库 */
export interface TrendingRepository {
  name: string;
  stars: number;
  language: string;
  description: string;
  url: string;
  updatedAt: string;
}

/** 城市天气观测 */
export interface WeatherObservation {
  city: string;
  temperatureC: number;
  temperatureF: number;
  condition: string;
  humidity: number;
  windSpeedKmph: number;
  windSpeedMps: number;
}

/** 加密货币报价 */
export interface CryptoQuote {
  coin: string;
  priceUsd: number;
  marketCapUsd: number;
  change24h: number;
  trend: 'up' | 'down';
}
