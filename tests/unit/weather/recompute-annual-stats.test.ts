import { describe, it, expect } from 'vitest';

import { recomputeAnnualStats } from '@/modules/weather/core/usecases/recompute-annual-stats.js';

import { makeAnnualStat } from '../../fixtures/builders.js';
import { makeFakeWeatherRepo, makeSilentLogger } from '../../fixtures/fakes.js';

describe('recomputeAnnualStats', () => {
  it('replaces the stored statistics with the fresh aggregates', async () => {
    const aggregates = [
      makeAnnualStat(),
      makeAnnualStat({ year: 1991, avgMaxTemp: null }),
      makeAnnualStat({ stationId: 'USC00339312', totalPrecipitation: 0 }),
    ];
    const weatherRepo = makeFakeWeatherRepo({
      annualStats: [makeAnnualStat({ stationId: 'OLD00000001', year: 1950 })],
      aggregates,
    });

    const result = await recomputeAnnualStats({ weatherRepo, logger: makeSilentLogger() });

    const summary = result._unsafeUnwrap();
    expect(summary.recordsStored).toBe(3);
    expect(summary.durationMs).toBeGreaterThanOrEqual(0);
    expect(weatherRepo.annualStats).toEqual(aggregates);
  });

  it('empties the table when there are no observations', async () => {
    const weatherRepo = makeFakeWeatherRepo({ annualStats: [makeAnnualStat()], aggregates: [] });

    const result = await recomputeAnnualStats({ weatherRepo, logger: makeSilentLogger() });

    expect(result._unsafeUnwrap().recordsStored).toBe(0);
    expect(weatherRepo.annualStats).toEqual([]);
  });

  it('keeps the previous statistics when the replace fails', async () => {
    const previous = [makeAnnualStat({ stationId: 'OLD00000001', year: 1950 })];
    const weatherRepo = makeFakeWeatherRepo({
      annualStats: previous,
      aggregates: [makeAnnualStat(), makeAnnualStat()],
    });

    const result = await recomputeAnnualStats({ weatherRepo, logger: makeSilentLogger() });

    expect(result._unsafeUnwrapErr().type).toBe('DatabaseError');
    expect(weatherRepo.annualStats).toEqual(previous);
  });

  it('returns the storage error when aggregation fails', async () => {
    const weatherRepo = makeFakeWeatherRepo({ simulateDbError: true });

    const result = await recomputeAnnualStats({ weatherRepo, logger: makeSilentLogger() });

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: 'DatabaseError',
      message: 'Simulated database error',
    });
  });
});
