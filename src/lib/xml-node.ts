/**
 * xml2js 解析結果的存取工具
 * xml2js 預設把子元素放在陣列、屬性放在 "$"、有屬性的元素文字放在 "_"
 */

type XmlRecord = Record<string, unknown>;

function isRecord(value: unknown): value is XmlRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 同名子元素
 */
export function children(node: unknown, name: string): unknown[] {
  if (!isRecord(node)) return [];
  const value = node[name];
  if (Array.isArray(value)) return value;
  return value === undefined ? [] : [value];
}

/**
 * 第一個同名子元素
 */
export function child(node: unknown, name: string): unknown {
  return children(node, name)[0];
}

/**
 * 依路徑往下走，沿途展開所有同名元素
 * e.g. descend(root, 'itdDepartureList', 'itdDeparture')
 */
export function descend(node: unknown, ...path: string[]): unknown[] {
  let current: unknown[] = [node];
  for (const name of path) {
    current = current.flatMap((n) => children(n, name));
  }
  return current;
}

export function attr(node: unknown, name: string): string | undefined {
  if (!isRecord(node)) return undefined;
  const attributes = node.$;
  if (!isRecord(attributes)) return undefined;
  const value = attributes[name];
  return typeof value === 'string' ? value : undefined;
}

export function intAttr(node: unknown, name: string): number | undefined {
  const value = attr(node, name);
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

export function text(node: unknown): string | undefined {
  if (typeof node === 'string') return node;
  if (isRecord(node) && typeof node._ === 'string') return node._;
  return undefined;
}
