/**
 * 处理结果存储
 * 处理结果文件每次覆盖；归档副本只追加，同一运行重复写入时内容必须一致
 */

import fs from 'fs';
import path from 'path';
import { LatestPointer, POINTER_SCHEMA_VERSION, PointerEntry } from './types/latest-pointer';
import { SourceId, isSourceId } from '../collection/types/raw-record';
import { PipelineError, PipelineErrorType } from '../utils/error-handler';
import { isRecord, isString } from '../utils/type-guards';
import { writeFileAtomic } from '../utils/fs-utils';
import { runDate } from '../utils/run-id';

export interface SnapshotStorePaths {
  processedDir: string;
  archiveDir: string;
  latestPointerPath: string;
}

function isNullableString(value: unknown): value is string | null {
  return value === null || isString(value);
}

function isPointerEntry(value: unknown): value is PointerEntry {
  return isRecord(value)
    && isString(value.source) && isSourceId(value.source)
    && (value.status === 'ok' || value.status === 'no_data')
    && isNullableString(value.path)
    && isNullableString(value.archivePath)
    && typeof value.recordCount === 'number'
    && typeof value.droppedCount === 'number'
    && isNullableString(value.reason);
}

export class SnapshotStore {
  private paths: SnapshotStorePaths;

  constructor(paths: SnapshotStorePaths) {
    this.paths = paths;
  }

  get pointerPath(): string {
    return this.paths.latestPointerPath;
  }

  /**
   * 覆盖写入某数据源的最新处理结果
   */
  writeProcessed(source: SourceId, csv: string): string {
    const filePath = path.join(this.paths.processedDir, `${source}.csv`);
    writeFileAtomic(filePath, csv);
    return filePath;
  }

  /**
   * 写入按日期归档的副本
   */
  writeArchive(runId: string, source: SourceId, csv: string): string {
    const filePath = path.join(this.paths.archiveDir, runDate(runId), `${source}_${runId}.csv`);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });

    if (fs.existsSync(filePath)) {
      const existing = fs.readFileSync(filePath, 'utf8');
      if (existing !== csv) {
        throw new PipelineError(
          `Archive snapshot ${filePath} already exists with different content`,
          PipelineErrorType.SNAPSHOT_CONFLICT,
          source,
          'archive',
          { runId }
        );
      }
      return filePath;
    }

    fs.writeFileSync(filePath, csv, { encoding: 'utf8', flag: 'wx' });
    return filePath;
  }

  writePointer(pointer: LatestPointer): string {
    writeFileAtomic(this.paths.latestPointerPath, `${JSON.stringify(pointer, null, 2)}\n`);
    return this.paths.latestPointerPath;
  }

  /**
   * 读取并校验最新指针，不存在时返回null
   */
  readPointer(): LatestPointer | null {
    if (!fs.existsSync(this.paths.latestPointerPath)) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.paths.latestPointerPath, 'utf8'));
    } catch (error) {
      throw new PipelineError(
        `Latest pointer ${this.paths.latestPointerPath} is not valid JSON`,
        PipelineErrorType.RENDER_ERROR,
        undefined,
        'readPointer',
        { reason: error instanceof Error ? error.message : String(error) }
      );
    }

    if (!isRecord(parsed) || parsed.schemaVersion !== POINTER_SCHEMA_VERSION) {
      throw new PipelineError(
        `Latest pointer ${this.paths.latestPointerPath} has an unsupported schema version`,
        PipelineErrorType.RENDER_ERROR,
        undefined,
        'readPointer'
      );
    }

    const sources = parsed.sources;
    if (!isString(parsed.runId) || !isString(parsed.runTimestamp) || !Array.isArray(sources) || !sources.every(isPointerEntry)) {
      throw new PipelineError(
        `Latest pointer ${this.paths.latestPointerPath} is malformed`,
        PipelineErrorType.RENDER_ERROR,
        undefined,
        'readPointer'
      );
    }

    return {
      schemaVersion: POINTER_SCHEMA_VERSION,
      runId: parsed.runId,
      runTimestamp: parsed.runTimestamp,
      sources
    };
  }
}
