/**
 * EFA Parser Tests
 * XML 回應解析測試
 */

import { describe, it, expect } from 'vitest';
import fs from 'node:fs';
import { parseDepartureMonitor, parseDepartureMonitorXml } from '../../src/services/efa-parser.js';

function fixture(name: string): string {
  return fs.readFileSync(new URL(`../fixtures/${name}`, import.meta.url), 'utf-8');
}

describe('parseDepartureMonitorXml', () => {
  describe('departures', () => {
    it('should parse every departure in order', async () => {
      const parsed = await parseDepartureMonitorXml(fixture('departures.xml'));
      expect(parsed.errstr).toBeUndefined();
      expect(parsed.departures.map((d) => d.line)).toEqual([
        'ICE 946 Intercity-Express',
        'U18',
        'RE1',
        '145',
      ]);
    });

    it('should parse a delayed national rail departure', async () => {
      const [ice] = (await parseDepartureMonitorXml(fixture('departures.xml'))).departures;
      expect(ice).toEqual({
        date: '18.10.2026',
        time: '09:40',
        realTime: '09:44',
        platform: '1',
        platformDb: true,
        line: 'ICE 946 Intercity-Express',
        destination: 'Düsseldorf Hbf',
        info: 'Bordrestaurant geschlossen',
        delay: 4,
        cancelled: false,
        countdown: 12,
      });
    });

    it('should take the platform number from the platform name', async () => {
      const [, tram] = (await parseDepartureMonitorXml(fixture('departures.xml'))).departures;
      expect(tram.platform).toBe('2');
      expect(tram.platformDb).toBe(false);
      expect(tram.realTime).toBeUndefined();
      expect(tram.delay).toBe(0);
    });

    it('should detect cancelled departures', async () => {
      const [, , regional] = (await parseDepartureMonitorXml(fixture('departures.xml'))).departures;
      expect(regional.cancelled).toBe(true);
      expect(regional.delay).toBe(0);
      expect(regional.platform).toBe('5');
      expect(regional.platformDb).toBe(true);
    });

    it('should compute the delay from real-time data and join info texts', async () => {
      const [, , , bus] = (await parseDepartureMonitorXml(fixture('departures.xml'))).departures;
      expect(bus.time).toBe('10:01');
      expect(bus.realTime).toBe('10:03');
      expect(bus.delay).toBe(2);
      expect(bus.platform).toBe('Bussteig C');
      expect(bus.info).toBe('Umleitung\nHaltestelle verlegt');
    });
  });

  describe('lines', () => {
    it('should parse serving lines', async () => {
      const parsed = await parseDepartureMonitorXml(fixture('departures.xml'));
      expect(parsed.lines).toEqual([
        {
          type: 'Stadtbahn',
          name: 'U18',
          direction: 'Mülheim Hbf',
          route: 'Essen Berliner Platz - Mülheim Hbf',
          mot: '4',
        },
        { type: 'Bus', name: '145', direction: 'Essen Ruhrallee', mot: '5' },
        { type: 'Regional-Express', name: 'RE1', direction: 'Aachen Hbf', route: 'Hamm - Aachen', mot: '0' },
      ]);
    });
  });

  describe('errors', () => {
    it('should report ambiguous names with their candidates', async () => {
      const parsed = await parseDepartureMonitorXml(fixture('ambiguous-name.xml'));
      expect(parsed.errstr).toBe('ambiguous name parameter: Hauptbahnhof | Hauptbahnhof Süd');
      expect(parsed.departures).toEqual([]);
    });

    it('should report unidentified places', async () => {
      const parsed = await parseDepartureMonitorXml(fixture('unknown-place.xml'));
      expect(parsed.errstr).toBe('invalid place parameter');
    });

    it('should report malformed XML', async () => {
      const parsed = await parseDepartureMonitorXml('<itdRequest><unclosed></itdRequest>');
      expect(parsed.errstr).toMatch(/^unable to parse EFA response: /);
    });

    it('should report responses without departure monitor data', () => {
      expect(parseDepartureMonitor({ itdRequest: { $: { version: '10' } } }).errstr)
        .toBe('unexpected EFA response: no departure monitor data');
    });
  });

  it('should skip departures without a scheduled time', () => {
    const parsed = parseDepartureMonitor({
      itdRequest: {
        itdDepartureMonitorRequest: [{
          itdDepartureList: [{
            itdDeparture: [
              { $: { platform: '1', countdown: '1' } },
              {
                $: { platform: '2', countdown: '4' },
                itdDateTime: [{ itdDate: [{ $: { year: '2026', month: '10', day: '18' } }], itdTime: [{ $: { hour: '8', minute: '5' } }] }],
                itdServingLine: [{ $: { number: '107', direction: 'Gelsenkirchen' } }],
              },
            ],
          }],
        }],
      },
    });
    expect(parsed.departures).toHaveLength(1);
    expect(parsed.departures[0]).toMatchObject({ time: '08:05', platform: '2', line: '107', countdown: 4, info: '' });
  });
});
