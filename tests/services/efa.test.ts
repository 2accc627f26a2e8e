import { describe, it, expect, beforeEach, vi } from 'vitest';
import fs from 'node:fs';

// Mock ofetch with FetchError
vi.mock('ofetch', () => {
  class FetchError extends Error {
    statusCode?: number;
    status?: number;
    statusText?: string;
    statusMessage?: string;

    constructor(message: string) {
      super(message);
      this.name = 'FetchError';
    }
  }

  return {
    ofetch: vi.fn(),
    FetchError,
  };
});

import { ofetch, FetchError } from 'ofetch';
import { EfaClient, buildRequestForm } from '../../src/services/efa.js';
import type { RequestDescriptor } from '../../src/types/efa.js';

const serviceUrl = 'https://efa.example.test/vrr/XSLT_DM_REQUEST';

function fixture(name: string): string {
  return fs.readFileSync(new URL(`../fixtures/${name}`, import.meta.url), 'utf-8');
}

function request(overrides: Partial<RequestDescriptor> = {}): RequestDescriptor {
  return { place: 'Essen', name: 'Hauptbahnhof', serviceUrl, ...overrides };
}

describe('buildRequestForm', () => {
  it('should describe a stop query by default', () => {
    const form = buildRequestForm(request());
    expect(form).toBeInstanceOf(URLSearchParams);
    if (!(form instanceof URLSearchParams)) return;

    expect(form.get('place_dm')).toBe('Essen');
    expect(form.get('name_dm')).toBe('Hauptbahnhof');
    expect(form.get('type_dm')).toBe('stop');
    expect(form.get('outputFormat')).toBe('XML');
    expect(form.get('mode')).toBe('direct');
    expect(form.get('useRealtime')).toBe('1');
    expect(form.has('itdDateDay')).toBe(false);
    expect(form.has('itdTimeHour')).toBe(false);
  });

  it('should send the location type', () => {
    const form = buildRequestForm(request({ locationType: 'poi' }));
    expect(form instanceof URLSearchParams && form.get('type_dm')).toBe('poi');
  });

  it('should split date and time', () => {
    const form = buildRequestForm(request({ date: '24.12', time: '9:05' }), new Date(2026, 9, 18));
    if (!(form instanceof URLSearchParams)) {
      throw new Error(`unexpected error: ${form.errstr}`);
    }
    expect(form.get('itdDateDay')).toBe('24');
    expect(form.get('itdDateMonth')).toBe('12');
    expect(form.get('itdDateYear')).toBe('2026');
    expect(form.get('itdTimeHour')).toBe('9');
    expect(form.get('itdTimeMinute')).toBe('5');
  });

  it('should report malformed dates', () => {
    expect(buildRequestForm(request({ date: '2026-12-24' }))).toEqual({ errstr: 'date must match dd.mm.[yyyy]' });
  });

  it('should report malformed times', () => {
    expect(buildRequestForm(request({ time: 'noon' }))).toEqual({ errstr: 'time must match hh:mm' });
  });
});

describe('EfaClient', () => {
  let client: EfaClient;

  beforeEach(() => {
    vi.clearAllMocks();
    client = new EfaClient();
  });

  it('should POST the form and parse the response', async () => {
    vi.mocked(ofetch).mockResolvedValueOnce(fixture('departures.xml'));

    const result = await client.query(request());

    expect(ofetch).toHaveBeenCalledOnce();
    expect(ofetch).toHaveBeenCalledWith(serviceUrl, expect.objectContaining({
      method: 'POST',
      responseType: 'text',
      retry: 0,
    }));
    const body = vi.mocked(ofetch).mock.calls[0][1]?.body;
    expect(body instanceof URLSearchParams && body.get('name_dm')).toBe('Hauptbahnhof');

    expect(result.errstr()).toBeUndefined();
    expect(result.departures()).toHaveLength(4);
    expect(result.lines().map((line) => line.name)).toEqual(['U18', '145', 'RE1']);
  });

  it('should pass through EFA identification errors', async () => {
    vi.mocked(ofetch).mockResolvedValueOnce(fixture('unknown-place.xml'));

    const result = await client.query(request({ place: 'Atlantis' }));

    expect(result.errstr()).toBe('invalid place parameter');
    expect(result.departures()).toEqual([]);
  });

  it('should report HTTP failures as errstr', async () => {
    vi.mocked(ofetch).mockRejectedValueOnce(
      Object.assign(new FetchError('[POST] failed'), { statusCode: 503, statusText: 'Service Unavailable' })
    );

    const result = await client.query(request());

    expect(result.errstr()).toBe('POST failed: 503 Service Unavailable');
  });

  it('should report network failures as errstr', async () => {
    vi.mocked(ofetch).mockRejectedValueOnce(new Error('getaddrinfo ENOTFOUND efa.example.test'));

    const result = await client.query(request());

    expect(result.errstr()).toBe('POST failed: getaddrinfo ENOTFOUND efa.example.test');
  });

  it('should not send a request for a malformed date', async () => {
    const result = await client.query(request({ date: 'tomorrow' }));

    expect(result.errstr()).toBe('date must match dd.mm.[yyyy]');
    expect(ofetch).not.toHaveBeenCalled();
  });
});
