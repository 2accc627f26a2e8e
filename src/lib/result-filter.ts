/**
 * Result Filter Module
 * 路線 / 月台篩選模組 - 精確比對，不做子字串或前綴比對
 */

import type { DepartureRecord, LineRecord, TimeDisplayMode } from '../types/efa.js';

/**
 * 空集合 = 不篩選
 */
export type NameFilter = ReadonlySet<string>;

export const DB_PLATFORM_SUFFIX = ' (DB)';

/**
 * 將重複旗標與逗號分隔的值攤平成一個集合
 * e.g. ['18', 'RE1,U79'] → {'18', 'RE1', 'U79'}
 */
export function buildFilter(values: readonly string[] = []): NameFilter {
  const filter = new Set<string>();
  for (const value of values) {
    for (const item of value.split(',')) {
      if (item.length > 0) filter.add(item);
    }
  }
  return filter;
}

function matches(filter: NameFilter, value: string): boolean {
  return filter.size === 0 || filter.has(value);
}

/**
 * 顯示用月台名稱，德鐵月台加上 " (DB)"
 */
export function effectivePlatform(departure: Pick<DepartureRecord, 'platform' | 'platformDb'>): string {
  return departure.platformDb ? departure.platform + DB_PLATFORM_SUFFIX : departure.platform;
}

export function filterLines(lines: readonly LineRecord[], lineFilter: NameFilter): LineRecord[] {
  return lines.filter((line) => matches(lineFilter, line.name));
}

/**
 * 篩選班次
 * 相對時間模式下，已取消的班次直接移除（倒數時間沒有意義）；
 * 絕對時間模式保留並標示 CANCELED
 */
export function filterDepartures(
  departures: readonly DepartureRecord[],
  lineFilter: NameFilter,
  platformFilter: NameFilter,
  mode: TimeDisplayMode = 'absolute'
): DepartureRecord[] {
  return departures.filter((departure) => {
    if (mode === 'relative' && departure.cancelled) {
      return false;
    }
    return matches(lineFilter, departure.line) && matches(platformFilter, effectivePlatform(departure));
  });
}
