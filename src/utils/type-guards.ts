/**
 * 类型守卫
 */

export type UnknownRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

export function isRecordArray(value: unknown): value is UnknownRecord[] {
  return Array.isArray(value) && value.every(isRecord);
}

/**
 * 读取可选字符串字段
 */
export function optionalString(record: UnknownRecord, key: string): string | undefined {
  const value = record[key];
  return isString(value) ? value : undefined;
}
