import type { LogLevel } from '../lib/logger.js';

/**
 * 輸出格式
 */
export type OutputFormat = 'table' | 'json';

/**
 * 設定檔結構
 */
export interface AppConfig {
  /** EFA 服務端點 */
  efaUrl?: string;
  /** 預設輸出格式 */
  format?: OutputFormat;
  /** 日誌最小級別 */
  logLevel?: LogLevel;
}

/**
 * 設定鍵值
 */
export type ConfigKey = keyof AppConfig;
