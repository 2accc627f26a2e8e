/**
 * EFA Response Parser
 * 將 XSLT_DM_REQUEST 的 XML 回應轉為路線與班次資料
 */

import xml2js from 'xml2js';
import { attr, child, children, descend, intAttr, text } from '../lib/xml-node.js';
import { diffMinutes, formatClock, formatDate, type EfaDate, type EfaTime } from '../lib/time-utils.js';
import type { DepartureRecord, LineRecord } from '../types/efa.js';

/** itdNoTrain@delay 表示班次取消的值 */
const CANCELLED_DELAY = -9999;

export interface ParsedResponse {
  errstr?: string;
  lines: LineRecord[];
  departures: DepartureRecord[];
}

type DateTime = EfaDate & EfaTime;

function parseDateTime(node: unknown): DateTime | undefined {
  const date = child(node, 'itdDate');
  const time = child(node, 'itdTime');
  const year = intAttr(date, 'year');
  const month = intAttr(date, 'month');
  const day = intAttr(date, 'day');
  const hour = intAttr(time, 'hour');
  const minute = intAttr(time, 'minute');
  if (
    year === undefined || month === undefined || day === undefined ||
    hour === undefined || minute === undefined ||
    // EFA 以 -1 表示沒有資料
    year < 0 || hour < 0 || minute < 0
  ) {
    return undefined;
  }
  return { year, month, day, hour, minute };
}

/**
 * 地點 / 名稱辨識狀態
 * list → 有多個候選；notidentified → 找不到
 */
function identificationError(odv: unknown, key: 'place' | 'name'): string | undefined {
  const element = key === 'place' ? 'itdOdvPlace' : 'itdOdvName';
  const candidateElement = key === 'place' ? 'odvPlaceElem' : 'odvNameElem';
  const node = child(odv, element);
  const state = attr(node, 'state');

  if (state === 'list') {
    const candidates = children(node, candidateElement)
      .map((candidate) => text(candidate)?.trim())
      .filter((candidate): candidate is string => Boolean(candidate));
    return candidates.length > 0
      ? `ambiguous ${key} parameter: ${candidates.join(' | ')}`
      : `ambiguous ${key} parameter`;
  }
  if (state === 'notidentified') {
    return `invalid ${key} parameter`;
  }
  return undefined;
}

/**
 * 月台：Gleis 開頭的是德鐵月台
 */
function parsePlatform(departure: unknown): { platform: string; platformDb: boolean } {
  const platformName = attr(departure, 'platformName') ?? '';
  const platformDb = /^Gleis\b/.test(platformName);

  const platform = attr(departure, 'platform');
  if (platform) {
    return { platform, platformDb };
  }
  const number = /(?:Gleis|Bstg\.)\s*(\S+)/.exec(platformName);
  return { platform: number ? number[1] : platformName, platformDb };
}

function parseInfo(departure: unknown): string {
  return descend(departure, 'itdInfoLinkList', 'itdBannerInfo', 'infoLink', 'infoLinkText')
    .map((node) => text(node)?.trim())
    .filter((info): info is string => Boolean(info))
    .join('\n');
}

function parseDeparture(departure: unknown): DepartureRecord | undefined {
  const scheduled = parseDateTime(child(departure, 'itdDateTime'));
  if (!scheduled) {
    return undefined;
  }
  const realtime = parseDateTime(child(departure, 'itdRTDateTime'));
  const servingLine = child(departure, 'itdServingLine');
  const delayAttr = intAttr(child(servingLine, 'itdNoTrain'), 'delay');

  const cancelled = delayAttr === CANCELLED_DELAY;
  let delay = 0;
  if (delayAttr !== undefined && !cancelled) {
    delay = delayAttr;
  } else if (delayAttr === undefined && realtime) {
    delay = diffMinutes(scheduled, realtime);
  }

  const record: DepartureRecord = {
    date: formatDate(scheduled),
    time: formatClock(scheduled),
    ...parsePlatform(departure),
    line: attr(servingLine, 'number') ?? attr(servingLine, 'symbol') ?? '',
    destination: attr(servingLine, 'direction') ?? '',
    info: parseInfo(departure),
    delay,
    cancelled,
    countdown: intAttr(departure, 'countdown') ?? 0,
  };
  if (realtime) {
    record.realTime = formatClock(realtime);
  }
  return record;
}

function parseLine(servingLine: unknown): LineRecord {
  const record: LineRecord = {
    type: attr(child(servingLine, 'itdNoTrain'), 'name') ?? '',
    name: attr(servingLine, 'number') ?? attr(servingLine, 'symbol') ?? '',
  };
  const direction = attr(servingLine, 'direction');
  const route = text(child(servingLine, 'itdRouteDescText'))?.trim();
  const mot = attr(servingLine, 'motType');
  if (direction) record.direction = direction;
  if (route) record.route = route;
  if (mot) record.mot = mot;
  return record;
}

/**
 * 解析已轉成物件的回應
 */
export function parseDepartureMonitor(document: unknown): ParsedResponse {
  const [request] = descend(document, 'itdRequest', 'itdDepartureMonitorRequest');
  if (request === undefined) {
    return { errstr: 'unexpected EFA response: no departure monitor data', lines: [], departures: [] };
  }

  for (const odv of children(request, 'itdOdv')) {
    const errstr = identificationError(odv, 'place') ?? identificationError(odv, 'name');
    if (errstr) {
      return { errstr, lines: [], departures: [] };
    }
  }

  const lines = descend(request, 'itdServingLines', 'itdServingLine').map(parseLine);
  const departures = descend(request, 'itdDepartureList', 'itdDeparture')
    .map(parseDeparture)
    .filter((departure): departure is DepartureRecord => departure !== undefined);

  return { lines, departures };
}

/**
 * 解析 XML 字串
 */
export async function parseDepartureMonitorXml(xml: string): Promise<ParsedResponse> {
  let document: unknown;
  try {
    document = await xml2js.parseStringPromise(xml);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { errstr: `unable to parse EFA response: ${reason}`, lines: [], departures: [] };
  }
  return parseDepartureMonitor(document);
}
