/**
 * 最新处理结果指针
 * 显式记录运行时间与文件路径，报告器只通过它定位处理结果
 */

import { SourceId } from '../../collection/types/raw-record';

export const POINTER_SCHEMA_VERSION = 1;

export type PointerStatus = 'ok' | 'no_data';

export interface PointerEntry {
  source: SourceId;
  status: PointerStatus;
  /** 处理结果文件 */
  path: string | null;
  /** 归档副本 */
  archivePath: string | null;
  recordCount: number;
  droppedCount: number;
  /** 无数据时的原因 */
  reason: string | null;
}

export interface LatestPointer {
  schemaVersion: typeof POINTER_SCHEMA_VERSION;
  runId: string;
  /** 运行时间（ISO 8601），由运行标识推出 */
  runTimestamp: string;
  sources: PointerEntry[];
}
