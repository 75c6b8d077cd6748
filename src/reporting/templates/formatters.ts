/**
 * 报告取值格式化
 */

function groupThousands(digits: string): string {
  return digits.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

/**
 * 固定小数位并添加千分位分隔符
 */
export function formatNumber(value: number, fractionDigits: number = 0): string {
  const fixed = Math.abs(value).toFixed(fractionDigits);
  const [integerPart, fractionPart] = fixed.split('.');
  const sign = value < 0 && Number(fixed) !== 0 ? '-' : '';
  return `${sign}${groupThousands(integerPart)}${fractionPart ? `.${fractionPart}` : ''}`;
}

/**
 * 带符号的百分比，例如 +2.35%
 */
export function formatSignedPercent(value: number): string {
  const text = formatNumber(value, 2);
  return value > 0 && Number(value.toFixed(2)) !== 0 ? `+${text}%` : `${text}%`;
}

export function formatUsd(value: number, fractionDigits: number = 2): string {
  return `$${formatNumber(value, fractionDigits)}`;
}

/**
 * 报告中使用的UTC时间，例如 2024-01-01 10:30:00 UTC
 */
export function formatUtcTimestamp(iso: string): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) {
    throw new Error(`Invalid timestamp: ${iso}`);
  }
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

/**
 * 转义表格单元格中会破坏markdown表格或标记的字符
 */
export function escapeTableCell(text: string): string {
  return text
    .replace(/\s+/g, ' ')
    .replace(/\\/g, '\\\\')
    .replace(/\|/g, '\\|')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .trim();
}

/**
 * 链接地址中的空白、括号、尖括号和竖线按百分号编码，避免破坏markdown链接与表格
 */
export function escapeLinkUrl(url: string): string {
  return url.trim().replace(/[\s()<>|]/g, char => `%${char.charCodeAt(0).toString(16).toUpperCase().padStart(2, '0')}`);
}
