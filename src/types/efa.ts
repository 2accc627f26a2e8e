/**
 * EFA 資料型別
 * 查詢描述與 EFA 回傳的路線 / 班次資料
 */

/**
 * 地點類型（對應 EFA 的 type_dm 參數）
 */
export type LocationType = 'stop' | 'address' | 'poi';

/**
 * 時間顯示模式
 */
export type TimeDisplayMode = 'absolute' | 'relative';

/**
 * 查詢描述
 */
export interface RequestDescriptor {
  /** 城市 */
  place: string;
  /** 站名 / 地址 / 地標名稱（已去除類型前綴） */
  name: string;
  /** 未指定時由 EFA 客戶端使用 stop */
  locationType?: LocationType;
  /** dd.mm[.yyyy]，不在本地驗證 */
  date?: string;
  /** hh:mm，不在本地驗證 */
  time?: string;
  serviceUrl: string;
}

/**
 * 停靠路線
 */
export interface LineRecord {
  /** 運具名稱，例如 "Stadtbahn" */
  type: string;
  name: string;
  direction?: string;
  route?: string;
  /** EFA motType 代碼 */
  mot?: string;
}

/**
 * 出發班次
 */
export interface DepartureRecord {
  /** DD.MM.YYYY */
  date: string;
  /** 表定時間 HH:MM */
  time: string;
  /** 即時時間 HH:MM */
  realTime?: string;
  platform: string;
  /** 月台屬於德鐵（DB） */
  platformDb: boolean;
  line: string;
  destination: string;
  /** 可能包含多行 */
  info: string;
  /** 誤點分鐘數，0 = 準點 */
  delay: number;
  cancelled: boolean;
  /** 距離出發的分鐘數 */
  countdown: number;
}

/**
 * 單一查詢的結果
 */
export interface DepartureMonitorResult {
  errstr(): string | undefined;
  lines(): LineRecord[];
  departures(): DepartureRecord[];
}

/**
 * 出發看板服務
 */
export interface DepartureMonitorService {
  query(request: RequestDescriptor): Promise<DepartureMonitorResult>;
}
