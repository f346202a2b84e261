/**
 * @module config-service
 *
 * 统一配置管理服务：集中管理所有环境变量配置。
 *
 * **设计目标**：
 * - 单一数据源：所有配置从 ConfigService 获取，避免散落的 process.env 访问
 * - 类型安全：提供强类型配置接口，在启动时校验配置有效性
 * - 可测试性：支持测试环境下重置配置
 *
 * **使用方式**：
 * ```typescript
 * import { ConfigService } from './config/config-service.js';
 *
 * const config = ConfigService.getInstance();
 * if (config.traceTraversals) {
 *   // 记录遍历耗时
 * }
 * ```
 */

import { Diagnostics } from '../diagnostics/diagnostics.js';
import { LogLevel } from '../utils/logger.js';

/**
 * 配置服务单例类。
 *
 * 在首次调用 getInstance() 时初始化，从环境变量读取所有配置。
 * 配置项在实例生命周期内保持不变（只读）。
 */
export class ConfigService {
  private static instance: ConfigService | null = null;

  /** 日志级别（默认 INFO） */
  readonly logLevel: LogLevel;

  /** 遍历允许的最大嵌套深度（默认 0，表示不限制；设置 IR_MAX_DEPTH 覆盖） */
  readonly maxTraversalDepth: number;

  /** 是否记录每次顶层遍历的耗时（默认 false，设置 IR_TRACE_TRAVERSALS=1 启用） */
  readonly traceTraversals: boolean;

  private constructor() {
    this.logLevel = this.parseLogLevel(process.env.LOG_LEVEL);
    this.maxTraversalDepth = this.parseDepth(process.env.IR_MAX_DEPTH);
    this.traceTraversals = process.env.IR_TRACE_TRAVERSALS === '1';
  }

  /**
   * 解析 LOG_LEVEL 环境变量为 LogLevel 枚举值，未知值回退到 INFO。
   */
  private parseLogLevel(raw: string | undefined): LogLevel {
    if (!raw) return LogLevel.INFO;
    switch (raw.toUpperCase()) {
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

  /**
   * 解析 IR_MAX_DEPTH。空值表示不限制；非负整数以外的值在启动时直接报错。
   */
  private parseDepth(raw: string | undefined): number {
    if (raw === undefined || raw.trim() === '') return 0;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 0) {
      Diagnostics.invalidConfigValue('IR_MAX_DEPTH', raw, 'a non-negative integer').throw();
    }
    return value;
  }

  /**
   * 获取 ConfigService 单例实例。
   */
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
