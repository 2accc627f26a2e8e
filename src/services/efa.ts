/**
 * EFA API Client
 * EFA 客戶端 - 發送出發看板（XSLT_DM_REQUEST）查詢
 */

import { ofetch, FetchError } from 'ofetch';
import { loggers } from '../lib/logger.js';
import { parseEfaDate, parseEfaTime } from '../lib/time-utils.js';
import { parseDepartureMonitorXml, type ParsedResponse } from './efa-parser.js';
import type {
  DepartureMonitorResult,
  DepartureMonitorService,
  DepartureRecord,
  LineRecord,
  RequestDescriptor,
} from '../types/efa.js';

/**
 * 單次查詢結果
 */
export class EfaResult implements DepartureMonitorResult {
  constructor(private readonly response: ParsedResponse) {}

  static failed(errstr: string): EfaResult {
    return new EfaResult({ errstr, lines: [], departures: [] });
  }

  errstr(): string | undefined {
    return this.response.errstr;
  }

  lines(): LineRecord[] {
    return this.response.lines;
  }

  departures(): DepartureRecord[] {
    return this.response.departures;
  }
}

/**
 * 建立 XSLT_DM_REQUEST 表單
 * 日期 / 時間格式不符時回傳錯誤訊息，不送出請求
 */
export function buildRequestForm(
  request: RequestDescriptor,
  now: Date = new Date()
): URLSearchParams | { errstr: string } {
  const form = new URLSearchParams({
    command: '',
    deleteAssignedStops_dm: '1',
    itdLPxx_id_dm: ':dm',
    language: 'de',
    mode: 'direct',
    name_dm: request.name,
    nameInfo_dm: 'invalid',
    nameState_dm: 'empty',
    outputFormat: 'XML',
    place_dm: request.place,
    placeInfo_dm: 'invalid',
    placeState_dm: 'empty',
    ptOptionsActive: '1',
    requestID: '0',
    sessionID: '0',
    type_dm: request.locationType ?? 'stop',
    typeInfo_dm: 'invalid',
    useProxFootSearch: '0',
    useRealtime: '1',
  });

  if (request.date !== undefined) {
    const date = parseEfaDate(request.date, now);
    if (!date) {
      return { errstr: 'date must match dd.mm.[yyyy]' };
    }
    form.set('itdDateDay', String(date.day));
    form.set('itdDateMonth', String(date.month));
    form.set('itdDateYear', String(date.year));
  }

  if (request.time !== undefined) {
    const time = parseEfaTime(request.time);
    if (!time) {
      return { errstr: 'time must match hh:mm' };
    }
    form.set('itdTimeHour', String(time.hour));
    form.set('itdTimeMinute', String(time.minute));
  }

  return form;
}

function describeFailure(error: unknown): string {
  if (error instanceof FetchError) {
    const status = error.statusCode ?? error.status;
    if (status) {
      return `${status} ${error.statusText ?? error.statusMessage ?? ''}`.trim();
    }
  }
  return error instanceof Error ? error.message : String(error);
}

export class EfaClient implements DepartureMonitorService {
  /**
   * 查詢出發看板，所有失敗都以 errstr 回報
   */
  async query(request: RequestDescriptor): Promise<DepartureMonitorResult> {
    const form = buildRequestForm(request);
    if (!(form instanceof URLSearchParams)) {
      return EfaResult.failed(form.errstr);
    }

    const context = {
      url: request.serviceUrl,
      place: request.place,
      name: request.name,
      type: form.get('type_dm'),
    };

    let xml: string;
    try {
      xml = await loggers.efa.trackAsync(
        'Departure monitor request',
        () =>
          ofetch(request.serviceUrl, {
            method: 'POST',
            body: form,
            responseType: 'text',
            retry: 0,
          }),
        context,
        // 失敗會透過 errstr 回報給使用者
        'debug'
      );
    } catch (error) {
      return EfaResult.failed(`POST failed: ${describeFailure(error)}`);
    }

    const parsed = await parseDepartureMonitorXml(xml);
    if (parsed.errstr) {
      loggers.efa.debug('EFA reported an error', { ...context, errstr: parsed.errstr });
    } else {
      loggers.efa.debug('EFA response parsed', {
        ...context,
        lines: parsed.lines.length,
        departures: parsed.departures.length,
      });
    }
    return new EfaResult(parsed);
  }
}
