/**
 * 原始数据暂存
 * 目录结构：<rawDir>/<runId>/<source>.json 与 <rawDir>/<runId>/manifest.json
 */

import fs from 'fs';
import path from 'path';
import { CollectionManifest, RawRecord, isSourceId } from './types/raw-record';
import { PipelineError, PipelineErrorType } from '../utils/error-handler';
import { isRecord, isString } from '../utils/type-guards';
import { isRunId } from '../utils/run-id';

const MANIFEST_FILE = 'manifest.json';

function isRawRecord(value: unknown): value is RawRecord {
  return isRecord(value)
    && isString(value.source) && isSourceId(value.source)
    && isString(value.sourceName)
    && isString(value.runId)
    && isString(value.collectedAt)
    && isString(value.endpoint)
    && 'payload' in value;
}

function isManifest(value: unknown): value is CollectionManifest {
  return isRecord(value)
    && isString(value.runId)
    && isString(value.startedAt)
    && isString(value.finishedAt)
    && Array.isArray(value.outcomes);
}

export class RawStore {
  private rawDir: string;

  constructor(rawDir: string) {
    this.rawDir = rawDir;
  }

  runDir(runId: string): string {
    return path.join(this.rawDir, runId);
  }

  /**
   * 写入原始记录，返回文件路径
   */
  writeRecord(record: RawRecord): string {
    const dir = this.runDir(record.runId);
    fs.mkdirSync(dir, { recursive: true });
    const filePath = path.join(dir, `${record.source}.json`);
    fs.writeFileSync(filePath, `${JSON.stringify(record, null, 2)}\n`, 'utf8');
    return filePath;
  }

  writeManifest(manifest: CollectionManifest): string {
    const dir = this.runDir(manifest.runId);
    fs.mkdirSync(dir, { recursive: true });
    const filePath = path.join(dir, MANIFEST_FILE);
    fs.writeFileSync(filePath, `${JSON.stringify(manifest, null, 2)}\n`, 'utf8');
    return filePath;
  }

  /**
   * 已暂存的运行，按时间升序
   */
  listRuns(): string[] {
    if (!fs.existsSync(this.rawDir)) {
      return [];
    }
    return fs.readdirSync(this.rawDir, { withFileTypes: true })
      .filter(entry => entry.isDirectory() && isRunId(entry.name))
      .map(entry => entry.name)
      .sort();
  }

  latestRunId(): string | null {
    const runs = this.listRuns();
    return runs.length > 0 ? runs[runs.length - 1] : null;
  }

  hasRun(runId: string): boolean {
    return isRunId(runId) && fs.existsSync(this.runDir(runId));
  }

  /**
   * 读取采集清单；清单不存在时返回null，内容无法识别时抛出响应格式错误
   */
  readManifest(runId: string): CollectionManifest | null {
    const filePath = path.join(this.runDir(runId), MANIFEST_FILE);
    if (!fs.existsSync(filePath)) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      throw new PipelineError(
        `Manifest ${filePath} is not valid JSON`,
        PipelineErrorType.MALFORMED_RESPONSE,
        undefined,
        'readManifest',
        { reason: error instanceof Error ? error.message : String(error) }
      );
    }
    return isManifest(parsed) ? parsed : null;
  }

  /**
   * 读取某次运行的原始记录文件列表
   */
  listRecordFiles(runId: string): string[] {
    const dir = this.runDir(runId);
    if (!fs.existsSync(dir)) {
      return [];
    }
    return fs.readdirSync(dir)
      .filter(name => name.endsWith('.json') && name !== MANIFEST_FILE)
      .sort()
      .map(name => path.join(dir, name));
  }

  /**
   * 读取单个原始记录文件，内容无法识别时抛出响应格式错误
   */
  readRecord(filePath: string): RawRecord {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      throw new PipelineError(
        `Raw record ${filePath} is not valid JSON`,
        PipelineErrorType.MALFORMED_RESPONSE,
        path.basename(filePath, '.json'),
        'readRawRecord',
        { reason: error instanceof Error ? error.message : String(error) }
      );
    }

    if (!isRawRecord(parsed)) {
      throw new PipelineError(
        `Raw record ${filePath} is missing required fields`,
        PipelineErrorType.MALFORMED_RESPONSE,
        path.basename(filePath, '.json'),
        'readRawRecord'
      );
    }
    return parsed;
  }
}
