/**
 * Display Width Utilities
 * 顯示寬度處理工具 - 以 Unicode code point 計算長度
 */

/**
 * 字串長度（code point 數，"ü" 算 1，不是 UTF-8 的 2 bytes）
 */
export function getDisplayWidth(str: string): number {
  return Array.from(str).length;
}

/**
 * 將字串填充到指定寬度（左對齊）
 */
export function padEnd(str: string, targetWidth: number, fillChar = ' '): string {
  const currentWidth = getDisplayWidth(str);
  if (currentWidth >= targetWidth) return str;
  return str + fillChar.repeat(targetWidth - currentWidth);
}

/**
 * 將字串填充到指定寬度（右對齊）
 */
export function padStart(str: string, targetWidth: number, fillChar = ' '): string {
  const currentWidth = getDisplayWidth(str);
  if (currentWidth >= targetWidth) return str;
  return fillChar.repeat(targetWidth - currentWidth) + str;
}
