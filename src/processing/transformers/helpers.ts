/**
 * 转换器共用的取值与单位换算函数
 */

import { PipelineError, PipelineErrorType } from '../../utils/error-handler';
import { SourceId } from '../../collection/types/raw-record';

/**
 * 将数值或数字字符串转换为数值，无法转换时返回undefined
 */
export function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function round(value: number, digits: number = 1): number {
  const factor = 10 ** digits;
  const rounded = Math.round(value * factor) / factor;
  return Object.is(rounded, -0) ? 0 : rounded;
}

export function celsiusToFahrenheit(celsius: number): number {
  return round(celsius * 9 / 5 + 32);
}

export function fahrenheitToCelsius(fahrenheit: number): number {
  return round((fahrenheit - 32) * 5 / 9);
}

export function kmphToMps(kmph: number): number {
  return round(kmph / 3.6);
}

/**
 * 按码点截断字符串
 */
export function truncate(text: string, maxLength: number, suffix: string = ''): string {
  const chars = Array.from(text);
  if (chars.length <= maxLength) {
    return text;
  }
  return chars.slice(0, maxLength).join('') + suffix;
}

export function malformedPayload(source: SourceId, message: string): PipelineError {
  return new PipelineError(message, PipelineErrorType.MALFORMED_RESPONSE, source, 'transform');
}
