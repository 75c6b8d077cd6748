/**
 * 报告器
 * 通过最新指针读取处理结果，渲染各区块并整体更新报告文档
 */

import fs from 'fs';
import { SourceId } from '../collection/types/raw-record';
import { SnapshotStore } from '../processing/snapshot-store';
import { DataCleaner } from '../processing/data-cleaner';
import { columnNames, schemaFor, toCryptoQuote, toTrendingRepository, toWeatherObservation } from '../processing/schemas';
import { LatestPointer, PointerEntry } from '../processing/types/latest-pointer';
import { ProcessedRecord } from '../processing/types/processed-record';
import { PipelineLogger, createStageLogger } from '../utils/logger';
import { PipelineError, PipelineErrorType, isPipelineError, toError } from '../utils/error-handler';
import { parseCsv } from '../utils/csv';
import { writeFileAtomic } from '../utils/fs-utils';
import { RenderContext, SectionRenderer } from './section-renderer';
import { SectionContent, applySections } from './document-editor';
import { LAST_UPDATED_SECTION, SectionId } from './templates/template-definitions';

export interface ReporterOptions {
  /** 需要渲染的数据源区块，按报告顺序 */
  sources: SourceId[];
  /** 热门仓库展示数量 */
  topRepositories: number;
}

export interface ReportResult {
  documentPath: string;
  runId: string;
  /** 更新的区块 */
  sections: SectionId[];
  /** 文档内容是否发生变化 */
  changed: boolean;
}

function renderError(message: string, operation: string, details?: Record<string, unknown>, source?: SourceId): PipelineError {
  return new PipelineError(message, PipelineErrorType.RENDER_ERROR, source, operation, details);
}

export class Reporter {
  private snapshotStore: SnapshotStore;
  private options: ReporterOptions;
  private renderer: SectionRenderer;
  private cleaner: DataCleaner;
  private logger: PipelineLogger;

  constructor(snapshotStore: SnapshotStore, options: ReporterOptions, renderer: SectionRenderer = new SectionRenderer()) {
    this.snapshotStore = snapshotStore;
    this.options = options;
    this.renderer = renderer;
    this.cleaner = new DataCleaner({ enableDeduplication: false, normalizeText: false });
    this.logger = createStageLogger('reporter');
  }

  /**
   * 更新报告文档；任何一步失败都抛出渲染错误，文档保持不变
   */
  report(documentPath: string): ReportResult {
    const pointer = this.snapshotStore.readPointer();
    if (!pointer) {
      throw renderError(
        `No latest pointer at ${this.snapshotStore.pointerPath}, nothing has been processed yet`,
        'readPointer'
      );
    }

    if (!fs.existsSync(documentPath)) {
      throw renderError(`Report document ${documentPath} does not exist`, 'readDocument');
    }
    const document = fs.readFileSync(documentPath, 'utf8');

    const sections = this.renderSections(pointer);
    const updated = applySections(document, sections);
    const changed = updated !== document;

    if (changed) {
      writeFileAtomic(documentPath, updated);
      this.logger.info(`Report ${documentPath} updated from run ${pointer.runId}`, {
        sections: sections.map(section => section.id)
      }, 'report');
    } else {
      this.logger.info(`Report ${documentPath} already up to date for run ${pointer.runId}`, undefined, 'report');
    }

    return {
      documentPath,
      runId: pointer.runId,
      sections: sections.map(section => section.id),
      changed
    };
  }

  /**
   * 渲染全部区块，末尾为更新时间
   */
  renderSections(pointer: LatestPointer): SectionContent[] {
    const context: RenderContext = { runId: pointer.runId, runTimestamp: pointer.runTimestamp };

    const sections: SectionContent[] = this.options.sources.map(source => {
      const entry = pointer.sources.find(item => item.source === source);
      const records = entry ? this.loadRecords(entry) : null;
      if (!records) {
        this.logger.warn(`No data for ${source} in run ${pointer.runId}`, {
          reason: entry ? entry.reason : 'source missing from latest pointer'
        }, 'render');
      }
      return { id: source, content: this.renderSource(source, records, context) };
    });

    sections.push({ id: LAST_UPDATED_SECTION, content: this.renderer.renderLastUpdated(context) });
    return sections;
  }

  private renderSource(source: SourceId, records: ProcessedRecord[] | null, context: RenderContext): string {
    try {
      switch (source) {
        case SourceId.GITHUB_TRENDING:
          return this.renderer.renderTrending(
            records ? records.map(toTrendingRepository) : null,
            context,
            this.options.topRepositories
          );
        case SourceId.WEATHER:
          return this.renderer.renderWeather(records ? records.map(toWeatherObservation) : null, context);
        case SourceId.CRYPTO:
          return this.renderer.renderCrypto(records ? records.map(toCryptoQuote) : null, context);
      }
    } catch (error) {
      if (isPipelineError(error)) {
        throw error;
      }
      throw renderError(`Failed to render ${source} section: ${toError(error).message}`, 'render', undefined, source);
    }
  }

  /**
   * 读取处理结果文件并还原字段类型；无数据时返回null
   */
  private loadRecords(entry: PointerEntry): ProcessedRecord[] | null {
    if (entry.status !== 'ok' || !entry.path) {
      return null;
    }

    if (!fs.existsSync(entry.path)) {
      throw renderError(`Processed file ${entry.path} is missing`, 'loadRecords', { path: entry.path }, entry.source);
    }

    const schema = schemaFor(entry.source);
    try {
      const { header, records } = parseCsv(fs.readFileSync(entry.path, 'utf8'));
      const expected = columnNames(schema);
      if (header.join(',') !== expected.join(',')) {
        throw new Error(`unexpected header "${header.join(',')}", expected "${expected.join(',')}"`);
      }
      return records.map((record, index) => this.cleaner.validate(record, schema, index));
    } catch (error) {
      throw renderError(
        `Processed file ${entry.path} cannot be loaded: ${toError(error).message}`,
        'loadRecords',
        { path: entry.path },
        entry.source
      );
    }
  }
}
