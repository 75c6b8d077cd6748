/**
 * 变量替换引擎实现
 * 语法：{{name}} 或 {{name|format}}
 */

import { PipelineError, PipelineErrorType } from '../../utils/error-handler';
import { escapeLinkUrl, escapeTableCell, formatNumber, formatSignedPercent, formatUsd, formatUtcTimestamp } from './formatters';

export type TemplateValue = string | number;

export type TemplateVariables = Record<string, TemplateValue>;

export type VariableFormatter = (value: TemplateValue) => string;

/**
 * 变量替换引擎配置
 */
export interface VariableReplacementEngineConfig {
  variablePattern: RegExp;
  /** 严格模式下缺失变量或未知格式会抛出渲染错误，否则保留原始表达式 */
  strictMode: boolean;
}

export const DEFAULT_VARIABLE_REPLACEMENT_CONFIG: VariableReplacementEngineConfig = {
  variablePattern: /\{\{([^{}]+)\}\}/g,
  strictMode: true
};

function asNumber(value: TemplateValue): number {
  const numeric = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(numeric)) {
    throw new Error(`"${value}" is not numeric`);
  }
  return numeric;
}

/**
 * 内置格式
 */
export const DEFAULT_FORMATTERS: Record<string, VariableFormatter> = {
  default: value => String(value),
  integer: value => formatNumber(asNumber(value), 0),
  fixed1: value => formatNumber(asNumber(value), 1),
  fixed2: value => formatNumber(asNumber(value), 2),
  percent: value => formatSignedPercent(asNumber(value)),
  usd: value => formatUsd(asNumber(value)),
  timestamp: value => formatUtcTimestamp(String(value)),
  cell: value => escapeTableCell(String(value)),
  url: value => escapeLinkUrl(String(value))
};

export class VariableReplacementEngine {
  private config: VariableReplacementEngineConfig;
  private formatters: Record<string, VariableFormatter>;

  constructor(
    config: Partial<VariableReplacementEngineConfig> = {},
    formatters: Record<string, VariableFormatter> = {}
  ) {
    this.config = { ...DEFAULT_VARIABLE_REPLACEMENT_CONFIG, ...config };
    this.formatters = { ...DEFAULT_FORMATTERS, ...formatters };
  }

  /**
   * 替换变量
   */
  replaceVariables(template: string, variables: TemplateVariables): string {
    return template.replace(this.config.variablePattern, (match: string, expression: string) => {
      try {
        return this.evaluate(expression.trim(), variables);
      } catch (error) {
        if (this.config.strictMode) {
          throw new PipelineError(
            `Failed to replace variable ${match}: ${error instanceof Error ? error.message : String(error)}`,
            PipelineErrorType.RENDER_ERROR,
            undefined,
            'replaceVariables',
            { expression }
          );
        }
        return match;
      }
    });
  }

  /**
   * 提取模板中引用的变量名（去重）
   */
  extractVariables(template: string): string[] {
    const names: string[] = [];
    for (const match of template.matchAll(this.config.variablePattern)) {
      names.push(match[1].split('|')[0].trim());
    }
    return [...new Set(names)];
  }

  private evaluate(expression: string, variables: TemplateVariables): string {
    const [name, format = 'default'] = expression.split('|').map(part => part.trim());

    if (!Object.prototype.hasOwnProperty.call(variables, name)) {
      throw new Error(`variable "${name}" is not defined`);
    }

    const formatter = this.formatters[format];
    if (!formatter) {
      throw new Error(`unknown format "${format}"`);
    }

    return formatter(variables[name]);
  }
}
