/**
 * 原始记录数据模型
 * 采集器按原样保存的响应内容及其元数据
 */

/** 数据源标识 */
export enum SourceId {
  GITHUB_TRENDING = 'github-trending',
  WEATHER = 'weather',
  CRYPTO = 'crypto'
}

export const ALL_SOURCES: readonly SourceId[] = [SourceId.GITHUB_TRENDING, SourceId.WEATHER, SourceId.CRYPTO];

export function isSourceId(value: string): value is SourceId {
  return ALL_SOURCES.some(source => source === value);
}

export interface RawRecord {
  /** 数据源标识 */
  source: SourceId;

  /** 数据源展示名称 */
  sourceName: string;

  /** 所属运行标识 */
  runId: string;

  /** 采集时间（ISO 8601） */
  collectedAt: string;

  /** 请求的端点 */
  endpoint: string;

  /** 响应正文，按原样保存 */
  payload: unknown;
}

/** 单个数据源的采集结果 */
export type SourceOutcome =
  | {
      source: SourceId;
      status: 'succeeded';
      rawPath: string;
      itemCount: number;
      collectedAt: string;
    }
  | {
      source: SourceId;
      status: 'failed';
      errorType: string;
      reason: string;
      failedAt: string;
    };

/** 一次采集运行的清单，写入暂存目录 */
export interface CollectionManifest {
  runId: string;
  startedAt: string;
  finishedAt: string;
  outcomes: SourceOutcome[];
}
