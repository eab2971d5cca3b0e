/**
 * @module config-service
 *
 * 统一配置管理服务：打印器相关的环境变量只在这里读取。
 *
 * **使用方式**：
 * ```typescript
 * import { ConfigService } from './config/config-service.js';
 *
 * const config = ConfigService.getInstance();
 * if (config.binderLabels === 'legacy') {
 *   // 沿用旧的量词标签
 * }
 * ```
 */

import { LogLevel } from '../utils/logger.js';

/**
 * 量化目标中绑定种类的标签风格。
 *
 * - `distinct`：类型绑定打印 `<type>`，生命周期绑定打印 `<lifetime>`
 * - `legacy`：两种绑定都打印 `<type>`（历史输出）
 */
export type BinderLabelStyle = 'distinct' | 'legacy';

/**
 * 配置服务单例类。
 *
 * 首次调用 getInstance() 时从环境变量读取，之后在实例生命周期内只读。
 */
export class ConfigService {
  private static instance: ConfigService | null = null;

  /** 日志级别（默认 INFO） */
  readonly logLevel: LogLevel;

  /** 量化目标的绑定标签风格（默认 distinct，设置 LOGIC_IR_BINDER_LABELS=legacy 切换） */
  readonly binderLabels: BinderLabelStyle;

  private constructor() {
    this.logLevel = this.parseLogLevel(process.env.LOG_LEVEL);
    this.binderLabels = this.parseBinderLabels(process.env.LOGIC_IR_BINDER_LABELS);
  }

  /**
   * 解析 LOG_LEVEL 环境变量，无法识别时回落到 INFO。
   */
  private parseLogLevel(raw: string | undefined): LogLevel {
    switch (raw?.trim().toUpperCase()) {
      case 'DEBUG':
        return LogLevel.DEBUG;
      case 'WARN':
        return LogLevel.WARN;
      case 'ERROR':
        return LogLevel.ERROR;
      default:
        return LogLevel.INFO;
    }
  }

  private parseBinderLabels(raw: string | undefined): BinderLabelStyle {
    return raw?.trim().toLowerCase() === 'legacy' ? 'legacy' : 'distinct';
  }

  static getInstance(): ConfigService {
    if (ConfigService.instance === null) {
      ConfigService.instance = new ConfigService();
    }
    return ConfigService.instance;
  }

  /**
   * 重置单例实例（仅用于测试）。
   *
   * 重置后，下次调用 getInstance() 会重新读取环境变量。
   */
  static resetForTesting(): void {
    ConfigService.instance = null;
  }
}
