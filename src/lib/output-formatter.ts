/**
 * Output Formatter Module
 * 輸出格式化模組 - 顯示列與純文字表格
 */

import { EmptyResultError } from './errors.js';
import { padEnd, padStart, getDisplayWidth } from './display-width.js';
import { effectivePlatform } from './result-filter.js';
import type { DepartureRecord, LineRecord, TimeDisplayMode } from '../types/efa.js';

/**
 * 四個主要欄位
 */
export type DisplayFields = readonly [string, string, string, string];

export type DisplayRow =
  | { kind: 'departure'; fields: DisplayFields; annotation?: string }
  | { kind: 'line'; fields: DisplayFields };

const COLUMN_SEPARATOR = '  ';

/**
 * 時間欄位
 * relative: "<countdown> min"（數字右對齊兩格）
 * absolute: 表定時間 + " CANCELED" + " (+誤點)"
 */
export function formatDepartureTime(departure: DepartureRecord, mode: TimeDisplayMode): string {
  if (mode === 'relative') {
    return `${padStart(String(departure.countdown), 2)} min`;
  }

  let time = departure.time;
  if (departure.cancelled) {
    time += ' CANCELED';
  }
  if (departure.delay > 0) {
    time += ` (+${departure.delay})`;
  }
  return time;
}

export function departureRow(departure: DepartureRecord, mode: TimeDisplayMode): DisplayRow {
  return {
    kind: 'departure',
    fields: [
      formatDepartureTime(departure, mode),
      effectivePlatform(departure),
      departure.line,
      departure.destination,
    ],
    annotation: departure.info,
  };
}

export function lineRow(line: LineRecord): DisplayRow {
  return {
    kind: 'line',
    fields: [line.type, line.name, line.direction ?? '', line.route ?? ''],
  };
}

/**
 * 將換行合併為單一空白，去除結尾空白
 */
export function normalizeAnnotation(annotation: string): string {
  return annotation.replace(/[\r\n]+/g, ' ').trimEnd();
}

/**
 * 計算每個欄位的最大寬度
 */
export function columnWidths(rows: readonly DisplayRow[]): [number, number, number, number] {
  const widths: [number, number, number, number] = [0, 0, 0, 0];
  for (const row of rows) {
    row.fields.forEach((field, i) => {
      widths[i] = Math.max(widths[i], getDisplayWidth(field));
    });
  }
  return widths;
}

/**
 * 格式化表格
 * 沒有任何列時丟出 EmptyResultError
 */
export function renderTable(rows: readonly DisplayRow[]): string {
  if (rows.length === 0) {
    throw new EmptyResultError();
  }

  const widths = columnWidths(rows);
  let output = '';

  for (const row of rows) {
    if (row.kind === 'departure' && row.annotation) {
      output += `\n# ${normalizeAnnotation(row.annotation)}\n`;
    }
    output += row.fields.map((field, i) => padEnd(field, widths[i])).join(COLUMN_SEPARATOR) + '\n';
  }

  return output;
}
