/**
 * 各数据源的记录结构与取值约束
 */

import { SourceId } from '../collection/types/raw-record';
import {
  CryptoQuote,
  ProcessedRecord,
  RecordSchema,
  TrendingRepository,
  WeatherObservation
} from './types/processed-record';

export const GITHUB_TRENDING_SCHEMA: RecordSchema = {
  source: SourceId.GITHUB_TRENDING,
  naturalKey: 'name',
  columns: [
    { name: 'name', kind: 'string' },
    { name: 'stars', kind: 'integer', min: 0 },
    { name: 'language', kind: 'string' },
    { name: 'description', kind: 'string' },
    { name: 'url', kind: 'string' },
    { name: 'updatedAt', kind: 'string' }
  ]
};

export const WEATHER_SCHEMA: RecordSchema = {
  source: SourceId.WEATHER,
  naturalKey: 'city',
  columns: [
    { name: 'city', kind: 'string' },
    { name: 'temperatureC', kind: 'number', min: -90, max: 60 },
    { name: 'temperatureF', kind: 'number', min: -130, max: 140 },
    { name: 'condition', kind: 'string' },
    { name: 'humidity', kind: 'number', min: 0, max: 100 },
    { name: 'windSpeedKmph', kind: 'number', min: 0 },
    { name: 'windSpeedMps', kind: 'number', min: 0 }
  ]
};

export const CRYPTO_SCHEMA: RecordSchema = {
  source: SourceId.CRYPTO,
  naturalKey: 'coin',
  columns: [
    { name: 'coin', kind: 'string' },
    { name: 'priceUsd', kind: 'number', min: 0 },
    { name: 'marketCapUsd', kind: 'number', min: 0 },
    { name: 'change24h', kind: 'number' },
    { name: 'trend', kind: 'string' }
  ]
};

const SCHEMAS: Record<SourceId, RecordSchema> = {
  [SourceId.GITHUB_TRENDING]: GITHUB_TRENDING_SCHEMA,
  [SourceId.WEATHER]: WEATHER_SCHEMA,
  [SourceId.CRYPTO]: CRYPTO_SCHEMA
};

export function schemaFor(source: SourceId): RecordSchema {
  return SCHEMAS[source];
}

export function columnNames(schema: RecordSchema): string[] {
  return schema.columns.map(column => column.name);
}

function stringField(record: ProcessedRecord, key: string): string {
  const value = record[key];
  if (typeof value !== 'string') {
    throw new Error(`Field ${key} is not a string`);
  }
  return value;
}

function numberField(record: ProcessedRecord, key: string): number {
  const value = record[key];
  if (typeof value !== 'number') {
    throw new Error(`Field ${key} is not a number`);
  }
  return value;
}

export function toTrendingRepository(record: ProcessedRecord): TrendingRepository {
  return {
    name: stringField(record, 'name'),
    stars: numberField(record, 'stars'),
    language: stringField(record, 'language'),
    description: stringField(record, 'description'),
    url: stringField(record, 'url'),
    updatedAt: stringField(record, 'updatedAt')
  };
}

export function toWeatherObservation(record: ProcessedRecord): WeatherObservation {
  return {
    city: stringField(record, 'city'),
    temperatureC: numberField(record, 'temperatureC'),
    temperatureF: numberField(record, 'temperatureF'),
    condition: stringField(record, 'condition'),
    humidity: numberField(record, 'humidity'),
    windSpeedKmph: numberField(record, 'windSpeedKmph'),
    windSpeedMps: numberField(record, 'windSpeedMps')
  };
}

export function toCryptoQuote(record: ProcessedRecord): CryptoQuote {
  return {
    coin: stringField(record, 'coin'),
    priceUsd: numberField(record, 'priceUsd'),
    marketCapUsd: numberField(record, 'marketCapUsd'),
    change24h: numberField(record, 'change24h'),
    trend: stringField(record, 'trend') === 'up' ? 'up' : 'down'
  };
}
