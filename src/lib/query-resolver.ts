/**
 * Query Parameter Resolver
 * 查詢參數解析 - 將 CLI 參數轉為查詢描述
 */

import { UsageError } from './errors.js';
import type { LocationType, RequestDescriptor } from '../types/efa.js';

export interface QueryOptions {
  date?: string;
  time?: string;
  /** 已套用設定檔 / 預設值的服務端點 */
  serviceUrl: string;
}

const LOCATION_PREFIXES = new Map<string, LocationType>([
  ['address', 'address'],
  ['poi', 'poi'],
  ['stop', 'stop'],
]);

/**
 * 拆出 "<type>:" 前綴，不認得的前綴視為名稱的一部分
 */
export function parseLocationName(raw: string): { name: string; locationType?: LocationType } {
  const match = /^([a-z]+):(.*)$/s.exec(raw);
  if (match) {
    const locationType = LOCATION_PREFIXES.get(match[1]);
    if (locationType) {
      return { name: match[2], locationType };
    }
  }
  return { name: raw };
}

export function resolveQuery(positionals: readonly string[], options: QueryOptions): RequestDescriptor {
  if (positionals.length !== 2) {
    throw new UsageError(`expected <city> and [<type>:]<name>, got ${positionals.length} argument(s)`);
  }

  const [place, rawName] = positionals;
  const { name, locationType } = parseLocationName(rawName);

  if (place.length === 0 || name.length === 0) {
    throw new UsageError('<city> and <name> must not be empty');
  }

  const request: RequestDescriptor = { place, name, serviceUrl: options.serviceUrl };
  if (locationType) request.locationType = locationType;
  if (options.date !== undefined) request.date = options.date;
  if (options.time !== undefined) request.time = options.time;
  return request;
}
