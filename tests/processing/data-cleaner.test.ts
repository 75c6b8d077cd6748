/**
 * 数据清洗器单元测试
 */

import { DataCleaner } from '../../src/processing/data-cleaner';
import { CRYPTO_SCHEMA, GITHUB_TRENDING_SCHEMA, WEATHER_SCHEMA } from '../../src/processing/schemas';
import { PipelineError, PipelineErrorType } from '../../src/utils/error-handler';

const validWeather = {
  city: 'Vancouver',
  temperatureC: 12,
  temperatureF: 53.6,
  condition: 'Light rain',
  humidity: '80',
  windSpeedKmph: 18,
  windSpeedMps: 5
};

function repository(name: string, stars: unknown) {
  return {
    name,
    stars,
    language: 'TypeScript',
    description: 'A repository',
    url: `https://github.com/${name}`,
    updatedAt: '2024-01-15T08:00:00Z'
  };
}

describe('DataCleaner', () => {
  let cleaner: DataCleaner;

  beforeEach(() => {
    cleaner = new DataCleaner();
  });

  describe('类型转换', () => {
    test('数字字符串转换为数值', () => {
      const record = cleaner.validate(validWeather, WEATHER_SCHEMA);

      expect(record.humidity).toBe(80);
      expect(record).toEqual({ ...validWeather, humidity: 80 });
    });

    test('文本去除多余空白', () => {
      const record = cleaner.validate({ ...validWeather, condition: '  Patchy \n rain ' }, WEATHER_SCHEMA);

      expect(record.condition).toBe('Patchy rain');
    });

    test('只保留结构中声明的字段', () => {
      const record = cleaner.validate({ ...validWeather, extra: 'ignored' }, WEATHER_SCHEMA);

      expect(Object.keys(record)).toEqual([
        'city', 'temperatureC', 'temperatureF', 'condition', 'humidity', 'windSpeedKmph', 'windSpeedMps'
      ]);
    });
  });

  describe('取值校验', () => {
    const invalidCases: Array<[Record<string, unknown>, string]> = [
      [{ ...validWeather, city: undefined }, 'Record 0 field "city" is missing'],
      [{ ...validWeather, city: '   ' }, 'Record 0 field "city" is empty'],
      [{ ...validWeather, humidity: 'humid' }, 'Record 0 field "humidity" is not a number ("humid")'],
      [{ ...validWeather, humidity: 120 }, 'Record 0 field "humidity" is above 100 (120)'],
      [{ ...validWeather, temperatureC: -95 }, 'Record 0 field "temperatureC" is below -90 (-95)'],
      [{ ...validWeather, condition: { text: 'Sunny' } }, 'Record 0 field "condition" is not text']
    ];

    test.each(invalidCases)('不合格记录抛出校验错误 %#', (candidate, message) => {
      expect(() => cleaner.validate(candidate, WEATHER_SCHEMA)).toThrow(message);
    });

    test('整数列拒绝小数', () => {
      expect(() => cleaner.validate(repository('owner/a', 10.5), GITHUB_TRENDING_SCHEMA, 3))
        .toThrow('Record 3 field "stars" is not an integer (10.5)');
    });

    test('校验错误携带数据源与字段', () => {
      let caught: unknown;
      try {
        cleaner.validate({ coin: 'bitcoin', priceUsd: -1, marketCapUsd: 0, change24h: 0, trend: 'down' }, CRYPTO_SCHEMA);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(PipelineError);
      expect(caught).toMatchObject({
        message: 'Record 0 field "priceUsd" is below 0 (-1)',
        context: { errorType: PipelineErrorType.VALIDATION_ERROR, source: 'crypto', operation: 'validate' }
      });
    });
  });

  describe('清洗', () => {
    test('丢弃不合格记录并保持顺序', () => {
      const result = cleaner.clean([
        repository('owner/a', 300),
        repository('owner/b', -1),
        repository('owner/c', '100')
      ], GITHUB_TRENDING_SCHEMA);

      expect(result.records.map(record => record.name)).toEqual(['owner/a', 'owner/c']);
      expect(result.records[1].stars).toBe(100);
      expect(result.dropped).toEqual([{ index: 1, reason: 'Record 1 field "stars" is below 0 (-1)' }]);
      expect(result.duplicateCount).toBe(0);
    });

    test('按自然键去重，保留首次出现的记录', () => {
      const result = cleaner.clean([
        repository('owner/a', 300),
        repository('owner/b', 200),
        repository('owner/a', 999)
      ], GITHUB_TRENDING_SCHEMA);

      expect(result.records.map(record => [record.name, record.stars])).toEqual([['owner/a', 300], ['owner/b', 200]]);
      expect(result.duplicateCount).toBe(1);
    });

    test('关闭去重时保留重复记录', () => {
      const result = new DataCleaner({ enableDeduplication: false }).clean([
        repository('owner/a', 300),
        repository('owner/a', 300)
      ], GITHUB_TRENDING_SCHEMA);

      expect(result.records).toHaveLength(2);
    });

    test('清洗结果满足所有列约束', () => {
      const candidates = [
        validWeather,
        { ...validWeather, city: 'Seattle', humidity: 101 },
        { ...validWeather, city: 'Toronto', temperatureF: '-4' },
        { ...validWeather, city: 'Montreal', windSpeedMps: null }
      ];

      const { records } = cleaner.clean(candidates, WEATHER_SCHEMA);

      expect(records.map(record => record.city)).toEqual(['Vancouver', 'Toronto']);
      for (const record of records) {
        for (const column of WEATHER_SCHEMA.columns) {
          const value = record[column.name];
          if (column.kind === 'string') {
            expect(typeof value).toBe('string');
          } else {
            expect(typeof value).toBe('number');
            if (typeof value === 'number') {
              expect(value).toBeGreaterThanOrEqual(column.min === undefined ? -Infinity : column.min);
              expect(value).toBeLessThanOrEqual(column.max === undefined ? Infinity : column.max);
            }
          }
        }
      }
    });
  });
});
