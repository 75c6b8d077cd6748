import fs from 'fs';
import path from 'path';
import { Processor, processRawRecord } from '../../src/processing/processor';
import { SnapshotStore } from '../../src/processing/snapshot-store';
import { RawStore } from '../../src/collection/raw-store';
import { RawRecord, SourceId } from '../../src/collection/types/raw-record';
import { PipelineErrorType } from '../../src/utils/error-handler';
import { createTempDir, cryptoPayload, githubPayload, removeDir, weatherResponse } from '../helpers/fixtures';

const RUN_ID = '20240115_083000';
const SOURCES = [SourceId.GITHUB_TRENDING, SourceId.WEATHER, SourceId.CRYPTO];

function rawRecord(source: SourceId, payload: unknown, runId: string = RUN_ID): RawRecord {
  return {
    source,
    sourceName: source,
    runId,
    collectedAt: '2024-01-15T08:30:01.000Z',
    endpoint: 'https://example.test',
    payload
  };
}

const GITHUB_CSV = [
  'name,stars,language,description,url,updatedAt',
  'owner/alpha,1500,TypeScript,About owner/alpha,https://github.com/owner/alpha,2024-01-15T08:00:00Z',
  'owner/beta,1200,N/A,No description,https://github.com/owner/beta,2024-01-15T08:00:00Z',
  ''
].join('\n');

describe('Processor', () => {
  let dir: string;
  let rawStore: RawStore;
  let snapshotStore: SnapshotStore;
  let processor: Processor;

  beforeEach(() => {
    dir = createTempDir();
    rawStore = new RawStore(path.join(dir, 'raw'));
    snapshotStore = new SnapshotStore({
      processedDir: path.join(dir, 'processed'),
      archiveDir: path.join(dir, 'archive'),
      latestPointerPath: path.join(dir, 'processed', 'latest.json')
    });
    processor = new Processor(rawStore, snapshotStore, {
      sources: SOURCES,
      enableArchive: true,
      now: () => new Date('2024-01-16T00:00:00Z')
    });
  });

  afterEach(() => {
    removeDir(dir);
  });

  function stageGithub(runId: string = RUN_ID): void {
    rawStore.writeRecord(rawRecord(SourceId.GITHUB_TRENDING, githubPayload([
      { name: 'owner/alpha', stars: 1500 },
      { name: 'owner/beta', stars: 1200, language: null, description: null },
      { name: 'owner/alpha', stars: 1500 }
    ]), runId));
  }

  test('写出处理结果、归档副本和最新指针', () => {
    stageGithub();
    rawStore.writeManifest({
      runId: RUN_ID,
      startedAt: '2024-01-15T08:30:00.000Z',
      finishedAt: '2024-01-15T08:30:03.000Z',
      outcomes: [
        { source: SourceId.CRYPTO, status: 'failed', errorType: PipelineErrorType.SOURCE_UNAVAILABLE, reason: 'HTTP 429', failedAt: '2024-01-15T08:30:02.000Z' }
      ]
    });

    const result = processor.process();

    const processedPath = path.join(dir, 'processed', 'github-trending.csv');
    const archivePath = path.join(dir, 'archive', '2024-01-15', `github-trending_${RUN_ID}.csv`);
    expect(result.hasData).toBe(true);
    expect(fs.readFileSync(processedPath, 'utf8')).toBe(GITHUB_CSV);
    expect(fs.readFileSync(archivePath, 'utf8')).toBe(GITHUB_CSV);
    expect(result.pointer).toEqual({
      schemaVersion: 1,
      runId: RUN_ID,
      runTimestamp: '2024-01-15T08:30:00.000Z',
      sources: [
        { source: SourceId.GITHUB_TRENDING, status: 'ok', path: processedPath, archivePath, recordCount: 2, droppedCount: 0, reason: null },
        { source: SourceId.WEATHER, status: 'no_data', path: null, archivePath: null, recordCount: 0, droppedCount: 0, reason: 'source not collected in this run' },
        { source: SourceId.CRYPTO, status: 'no_data', path: null, archivePath: null, recordCount: 0, droppedCount: 0, reason: 'source_unavailable: HTTP 429' }
      ]
    });
    expect(snapshotStore.readPointer()).toEqual(result.pointer);
  });

  test('重复处理同一运行得到相同的输出', () => {
    stageGithub();

    const first = processor.process(RUN_ID);
    const pointerBytes = fs.readFileSync(first.pointerPath, 'utf8');
    const second = processor.process(RUN_ID);

    expect(second.results.map(item => item.records)).toEqual(first.results.map(item => item.records));
    expect(second.pointer).toEqual(first.pointer);
    expect(fs.readFileSync(second.pointerPath, 'utf8')).toBe(pointerBytes);
  });

  test('默认处理最新一次运行', () => {
    stageGithub('20240114_083000');
    stageGithub('20240115_083000');

    expect(processor.process().runId).toBe('20240115_083000');
  });

  test('归档副本内容不同时该数据源无数据', () => {
    stageGithub();
    const archivePath = path.join(dir, 'archive', '2024-01-15', `github-trending_${RUN_ID}.csv`);
    fs.mkdirSync(path.dirname(archivePath), { recursive: true });
    fs.writeFileSync(archivePath, 'name\nother\n');

    const result = processor.process(RUN_ID);

    expect(result.hasData).toBe(false);
    expect(result.pointer.sources[0].status).toBe('no_data');
    expect(result.pointer.sources[0].reason).toBe(
      `snapshot_conflict: Archive snapshot ${archivePath} already exists with different content`
    );
    expect(fs.readFileSync(archivePath, 'utf8')).toBe('name\nother\n');
  });

  test('关闭归档时不写归档副本', () => {
    stageGithub();
    const withoutArchive = new Processor(rawStore, snapshotStore, { sources: SOURCES, enableArchive: false });

    const result = withoutArchive.process(RUN_ID);

    expect(result.pointer.sources[0].archivePath).toBeNull();
    expect(fs.existsSync(path.join(dir, 'archive'))).toBe(false);
  });

  test('没有暂存运行时所有数据源无数据', () => {
    const result = processor.process();

    expect(result.runId).toBe('20240116_000000');
    expect(result.hasData).toBe(false);
    expect(result.pointer.sources.map(entry => [entry.status, entry.reason])).toEqual([
      ['no_data', 'no staged collection run'],
      ['no_data', 'no staged collection run'],
      ['no_data', 'no staged collection run']
    ]);
  });

  test('所有记录都不合格时该数据源无数据', () => {
    rawStore.writeRecord(rawRecord(SourceId.WEATHER, {
      observations: [
        { city: 'Vancouver', response: weatherResponse(12, 130, 18, 'Rain') },
        { city: 'Seattle', response: {} }
      ],
      failedCities: []
    }));

    const result = processor.process(RUN_ID);

    expect(result.pointer.sources[1]).toEqual({
      source: SourceId.WEATHER,
      status: 'no_data',
      path: null,
      archivePath: null,
      recordCount: 0,
      droppedCount: 2,
      reason: 'no record passed validation'
    });
  });

  test('运行标识格式错误时抛出异常', () => {
    expect(() => processor.process('latest')).toThrow('Invalid run id: latest');
  });

  test('指定的运行未暂存时抛出异常且不改动最新指针', () => {
    stageGithub();
    const first = processor.process(RUN_ID);
    const pointerBytes = fs.readFileSync(first.pointerPath, 'utf8');

    expect(() => processor.process('20991231_000000')).toThrow('Collection run 20991231_000000 was never staged');
    expect(fs.readFileSync(first.pointerPath, 'utf8')).toBe(pointerBytes);
    expect(snapshotStore.readPointer()).toEqual(first.pointer);
  });

  test('采集清单损坏时其余数据源照常处理', () => {
    stageGithub();
    const manifestPath = path.join(dir, 'raw', RUN_ID, 'manifest.json');
    fs.writeFileSync(manifestPath, '{"runId": "2024');

    const result = processor.process(RUN_ID);

    expect(result.hasData).toBe(true);
    expect(result.pointer.sources.map(entry => entry.status)).toEqual(['ok', 'no_data', 'no_data']);
    expect(result.pointer.sources[1].reason).toBe(`malformed_response: Manifest ${manifestPath} is not valid JSON`);
  });
});

describe('processRawRecord', () => {
  test('相同输入得到相同输出', () => {
    const raw = rawRecord(SourceId.CRYPTO, cryptoPayload());

    const first = processRawRecord(raw);
    const second = processRawRecord(raw);

    expect(second).toEqual(first);
    expect(first.records).toEqual([
      { coin: 'bitcoin', priceUsd: 43250.5, marketCapUsd: 847000000000, change24h: 2.5, trend: 'up' },
      { coin: 'ethereum', priceUsd: 2250.25, marketCapUsd: 270000000000, change24h: -1.2, trend: 'down' }
    ]);
  });
});

describe('SnapshotStore', () => {
  let dir: string;
  let store: SnapshotStore;

  beforeEach(() => {
    dir = createTempDir();
    store = new SnapshotStore({
      processedDir: path.join(dir, 'processed'),
      archiveDir: path.join(dir, 'archive'),
      latestPointerPath: path.join(dir, 'latest.json')
    });
  });

  afterEach(() => {
    removeDir(dir);
  });

  test('相同内容重复归档不报错', () => {
    const first = store.writeArchive(RUN_ID, SourceId.CRYPTO, 'coin\nbitcoin\n');
    const second = store.writeArchive(RUN_ID, SourceId.CRYPTO, 'coin\nbitcoin\n');

    expect(second).toBe(first);
  });

  test('没有指针时返回null', () => {
    expect(store.readPointer()).toBeNull();
  });

  test('不支持的指针版本为渲染错误', () => {
    fs.writeFileSync(path.join(dir, 'latest.json'), JSON.stringify({ schemaVersion: 2, runId: RUN_ID, sources: [] }));

    expect(() => store.readPointer()).toThrow(`Latest pointer ${path.join(dir, 'latest.json')} has an unsupported schema version`);
  });

  test('指针结构错误为渲染错误', () => {
    fs.writeFileSync(path.join(dir, 'latest.json'), JSON.stringify({
      schemaVersion: 1,
      runId: RUN_ID,
      runTimestamp: '2024-01-15T08:30:00.000Z',
      sources: [{ source: 'unknown' }]
    }));

    expect(() => store.readPointer()).toThrow(`Latest pointer ${path.join(dir, 'latest.json')} is malformed`);
  });
});
