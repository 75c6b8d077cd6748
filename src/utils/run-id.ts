/**
 * 运行标识
 * 形如 20240101_103000（UTC），按字典序排序即按时间排序
 */

const RUN_ID_PATTERN = /^(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})$/;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function createRunId(date: Date = new Date()): string {
  return [
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`,
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  ].join('_');
}

export function isRunId(value: string): boolean {
  return RUN_ID_PATTERN.test(value);
}

/**
 * 解析运行标识为时间，格式不合法时抛出错误
 */
export function parseRunId(runId: string): Date {
  const match = RUN_ID_PATTERN.exec(runId);
  if (!match) {
    throw new Error(`Invalid run id: ${runId}`);
  }
  const [, year, month, day, hour, minute, second] = match.map(Number);
  return new Date(Date.UTC(year, month - 1, day, hour, minute, second));
}

/**
 * 运行日期，用于归档目录名
 */
export function runDate(runId: string): string {
  return parseRunId(runId).toISOString().slice(0, 10);
}
