import fs from 'fs';
import os from 'os';
import path from 'path';
import { LogLevel, PipelineLogger, parseLogLevel } from '../../src/utils/logger';

describe('PipelineLogger', () => {
  let infoSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    infoSpy = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('低于最小级别的日志不输出', () => {
    const logger = new PipelineLogger({ minLevel: LogLevel.WARN });

    logger.info('ignored');
    logger.error('kept', new Error('boom'));

    expect(infoSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0][0]).toContain('ERROR [pipeline] kept\nError: boom');
  });

  test('输出模块、操作和数据', () => {
    const logger = new PipelineLogger({ moduleName: 'collector' });

    logger.info('done', { count: 2 }, 'collect');

    const line: string = infoSpy.mock.calls[0][0];
    expect(line).toContain('INFO  [collector][collect] done');
    expect(line).toContain('Data: {\n  "count": 2\n}');
  });

  test('子日志器共享父日志器的配置', () => {
    const parent = new PipelineLogger({ moduleName: 'pipeline' });
    const child = parent.createSubLogger('reporter');

    parent.configure({ consoleOutput: false });
    child.info('silent');
    expect(infoSpy).not.toHaveBeenCalled();

    parent.configure({ consoleOutput: true });
    child.info('visible');
    expect(infoSpy.mock.calls[0][0]).toContain('[pipeline.reporter] visible');
  });

  test('配置文件路径时追加写入', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pipeline-log-'));
    const filePath = path.join(dir, 'logs', 'pipeline.log');
    const logger = new PipelineLogger({ consoleOutput: false, filePath });

    logger.warn('first');
    logger.warn('second');

    const lines = fs.readFileSync(filePath, 'utf8').trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[1]).toContain('WARN  [pipeline] second');
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('解析日志级别', () => {
    expect(parseLogLevel('DEBUG')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
    expect(parseLogLevel(undefined, LogLevel.ERROR)).toBe(LogLevel.ERROR);
  });
});
