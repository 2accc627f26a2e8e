/**
 * Config Service
 * 設定管理服務 - 處理設定檔讀取與環境變數
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { isLogLevel, loggers, type LogLevel } from '../lib/logger.js';
import type { AppConfig, ConfigKey, OutputFormat } from '../types/config.js';

export const DEFAULT_EFA_URL = 'https://efa.vrr.de/vrr/XSLT_DM_REQUEST';

const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'efa-m');
const DEFAULT_CONFIG_FILE = 'config.json';

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'table' || value === 'json';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 只保留型別正確的欄位
 */
function sanitize(raw: unknown): AppConfig {
  if (!isRecord(raw)) {
    return {};
  }
  const config: AppConfig = {};
  if (typeof raw.efaUrl === 'string' && raw.efaUrl.length > 0) {
    config.efaUrl = raw.efaUrl;
  }
  if (isOutputFormat(raw.format)) {
    config.format = raw.format;
  }
  if (isLogLevel(raw.logLevel)) {
    config.logLevel = raw.logLevel;
  }
  return config;
}

export class ConfigService {
  private configPath: string;
  private config: AppConfig;

  constructor(configPath?: string) {
    this.configPath = configPath || path.join(DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
    this.config = this.load();
  }

  /**
   * 載入設定檔，讀取失敗時記錄警告並使用空設定
   */
  private load(): AppConfig {
    if (!fs.existsSync(this.configPath)) {
      return {};
    }
    try {
      const content = fs.readFileSync(this.configPath, 'utf-8');
      return sanitize(JSON.parse(content));
    } catch (error) {
      loggers.config.warn('Ignoring unreadable config file', {
        path: this.configPath,
        reason: error instanceof Error ? error.message : String(error),
      });
      return {};
    }
  }

  get<K extends ConfigKey>(key: K): AppConfig[K] {
    return this.config[key];
  }

  getAll(): AppConfig {
    return { ...this.config };
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * 取得 EFA 端點（環境變數 > 設定檔 > 預設值）
   */
  getEfaUrl(): string {
    const envValue = process.env.EFA_URL;
    if (envValue && envValue.length > 0) {
      return envValue;
    }
    return this.config.efaUrl || DEFAULT_EFA_URL;
  }

  getFormat(): OutputFormat {
    return this.config.format || 'table';
  }

  /**
   * 取得日誌級別（環境變數 > 設定檔）
   */
  getLogLevel(): LogLevel | undefined {
    const envValue = process.env.EFA_LOG_LEVEL;
    if (isLogLevel(envValue)) {
      return envValue;
    }
    return this.config.logLevel;
  }
}
