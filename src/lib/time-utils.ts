/**
 * Time Utils Module
 * 時間工具模組 - EFA 日期 / 時間的解析與格式化
 */

export interface EfaDate {
  day: number;
  month: number;
  year: number;
}

export interface EfaTime {
  hour: number;
  minute: number;
}

/**
 * 解析 dd.mm[.yyyy]，未給年份時使用 now 的年份
 */
export function parseEfaDate(date: string, now: Date = new Date()): EfaDate | null {
  const match = /^(\d{1,2})\.(\d{1,2})(?:\.(\d{4})?)?$/.exec(date);
  if (!match) {
    return null;
  }
  const day = Number(match[1]);
  const month = Number(match[2]);
  if (day < 1 || day > 31 || month < 1 || month > 12) {
    return null;
  }
  const year = match[3] ? Number(match[3]) : now.getFullYear();
  return { day, month, year };
}

/**
 * 解析 hh:mm
 */
export function parseEfaTime(time: string): EfaTime | null {
  const match = /^(\d{1,2}):(\d{2})$/.exec(time);
  if (!match) {
    return null;
  }
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) {
    return null;
  }
  return { hour, minute };
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * HH:MM
 */
export function formatClock(time: EfaTime): string {
  return `${pad2(time.hour)}:${pad2(time.minute)}`;
}

/**
 * DD.MM.YYYY
 */
export function formatDate(date: EfaDate): string {
  return `${pad2(date.day)}.${pad2(date.month)}.${date.year}`;
}

/**
 * 兩個時間點相差的分鐘數 (later - earlier)
 */
export function diffMinutes(earlier: EfaDate & EfaTime, later: EfaDate & EfaTime): number {
  const toEpochMinutes = (t: EfaDate & EfaTime): number =>
    Date.UTC(t.year, t.month - 1, t.day, t.hour, t.minute) / 60000;
  return Math.round(toEpochMinutes(later) - toEpochMinutes(earlier));
}
