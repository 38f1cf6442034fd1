import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { FareTable } from './FareTable.js';
import { isCommuterRoute } from './transport.js';

const table = FareTable.fromData({
  trainFares: [
    { departure: '東京', destination: '新宿', fare: 210 },
    { departure: '新宿', destination: '渋谷', fare: 170 },
  ],
  fixedFares: { bus: 230, taxi: 2500, airplane: 25000 },
});

describe('FareTable', () => {
  it('should look up train fares by direction', () => {
    expect(table.lookup('東京駅', '新宿', '電車')).toEqual({
      ok: true,
      value: { fare: 210, transportType: 'train', source: 'route' },
    });
    expect(table.lookup('渋谷', '新宿', 'train')).toEqual({
      ok: false,
      error: 'No train fare found from 渋谷 to 新宿. Please enter the fare manually.',
    });
  });

  it('should use fixed fares for other transport', () => {
    expect(table.lookup('anywhere', 'elsewhere', 'バス')).toEqual({
      ok: true,
      value: { fare: 230, transportType: 'bus', source: 'fixed' },
    });
  });

  it('should reject unknown transport', () => {
    expect(table.lookup('東京', '新宿', 'ferry').ok).toBe(false);
  });

  it('should list stations', () => {
    expect(table.stations()).toEqual(['東京', '新宿', '渋谷']);
  });

  it('should reject malformed data', () => {
    expect(() => FareTable.fromData({ trainFares: [] })).toThrow(/Invalid fare data/);
  });

  it('should load the bundled fare file', async () => {
    const bundled = await FareTable.load(fileURLToPath(new URL('../../data/fares.json', import.meta.url)));
    expect(bundled.lookup('東京', '新宿', 'train')).toEqual({
      ok: true,
      value: { fare: 210, transportType: 'train', source: 'route' },
    });
  });
});

describe('isCommuterRoute', () => {
  const routes: Array<[string, string]> = [['上野', '豊洲']];

  it('should match either direction and ignore the 駅 suffix', () => {
    expect(isCommuterRoute('上野駅', '豊洲', routes)).toBe(true);
    expect(isCommuterRoute('豊洲', '上野', routes)).toBe(true);
    expect(isCommuterRoute('東京', '豊洲', routes)).toBe(false);
  });
});
