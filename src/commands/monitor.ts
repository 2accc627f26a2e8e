/**
 * Monitor Command
 * 出發看板 / 路線列表查詢
 */

import { resolveQuery } from '../lib/query-resolver.js';
import { buildFilter, filterDepartures, filterLines } from '../lib/result-filter.js';
import { departureRow, lineRow, renderTable } from '../lib/output-formatter.js';
import { RequestError } from '../lib/errors.js';
import { loggers, setGlobalLogLevel } from '../lib/logger.js';
import type { ConfigService } from '../services/config.js';
import type { OutputFormat } from '../types/config.js';
import type {
  DepartureMonitorService,
  DepartureRecord,
  LineRecord,
  TimeDisplayMode,
} from '../types/efa.js';

export interface MonitorOptions {
  date?: string;
  time?: string;
  line?: string[];
  linelist?: boolean;
  platform?: string[];
  relative?: boolean;
  efaUrl?: string;
  format?: OutputFormat;
  verbose?: boolean;
}

export interface OutputStreams {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface MonitorDependencies {
  service: DepartureMonitorService;
  config: ConfigService;
  io: OutputStreams;
}

function printJson(io: OutputStreams, key: 'lines' | 'departures', records: LineRecord[] | DepartureRecord[]): void {
  io.stdout(JSON.stringify({
    success: true,
    count: records.length,
    [key]: records,
  }, null, 2) + '\n');
}

/**
 * efa-m <city> [<type>:]<name>
 */
export async function runMonitor(
  positionals: readonly string[],
  options: MonitorOptions,
  deps: MonitorDependencies
): Promise<void> {
  const logLevel = options.verbose ? 'debug' : deps.config.getLogLevel();
  if (logLevel) {
    setGlobalLogLevel(logLevel);
  }

  const request = resolveQuery(positionals, {
    date: options.date,
    time: options.time,
    serviceUrl: options.efaUrl ?? deps.config.getEfaUrl(),
  });
  const mode: TimeDisplayMode = options.relative ? 'relative' : 'absolute';
  const format = options.format ?? deps.config.getFormat();
  const lineFilter = buildFilter(options.line);
  const platformFilter = buildFilter(options.platform);

  loggers.cli.debug('Query resolved', {
    url: request.serviceUrl,
    place: request.place,
    name: request.name,
    locationType: request.locationType,
    mode,
    lines: [...lineFilter],
    platforms: [...platformFilter],
  });

  const result = await deps.service.query(request);
  const errstr = result.errstr();
  if (errstr) {
    throw new RequestError(errstr);
  }

  if (options.linelist) {
    const lines = filterLines(result.lines(), lineFilter);
    if (format === 'json') {
      printJson(deps.io, 'lines', lines);
    } else {
      deps.io.stdout(renderTable(lines.map(lineRow)));
    }
    return;
  }

  const departures = filterDepartures(result.departures(), lineFilter, platformFilter, mode);
  if (format === 'json') {
    printJson(deps.io, 'departures', departures);
  } else {
    deps.io.stdout(renderTable(departures.map((departure) => departureRow(departure, mode))));
  }
}
