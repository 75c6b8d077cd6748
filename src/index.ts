/**
 * 每日数据流水线
 * 采集公开数据源，清洗后存储，并更新报告文档中的自动生成区块
 */

export * from './collection/types/raw-record';
export { RequestClient, HttpFetcher, HttpTransport, JsonRequest } from './collection/http/request-client';
export { BaseSource, GithubTrendingSource, WeatherSource, CryptoSource, createSources } from './collection/sources';
export { RawStore } from './collection/raw-store';
export { Collector, CollectionRunResult } from './collection/collector';

export * from './processing/types/processed-record';
export * from './processing/types/latest-pointer';
export * from './processing/schemas';
export { DataCleaner, CleaningResult } from './processing/data-cleaner';
export { SnapshotStore } from './processing/snapshot-store';
export { Processor, ProcessRunResult, processRawRecord } from './processing/processor';

export { Reporter, ReportResult } from './reporting/reporter';
export { SectionRenderer, RenderContext } from './reporting/section-renderer';
export { locateSection, applySections } from './reporting/document-editor';
export { VariableReplacementEngine } from './reporting/templates/variable-replacement-engine';
export * from './reporting/aggregates';

export { ConfigManager, PipelineConfig, buildConfig } from './system/config';
export { PipelineRunner, PipelineState, createPipelineStages } from './system/pipeline-runner';
export { createProgram } from './system/cli';

export * from './utils/error-handler';
export { PipelineLogger, LogLevel, defaultLogger } from './utils/logger';
