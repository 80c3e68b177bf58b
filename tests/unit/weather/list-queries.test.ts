import { describe, it, expect } from 'vitest';

import { listAnnualStats } from '@/modules/weather/core/usecases/list-annual-stats.js';
import { listObservations } from '@/modules/weather/core/usecases/list-observations.js';

import { makeAnnualStat, makeObservation } from '../../fixtures/builders.js';
import { makeFakeWeatherRepo } from '../../fixtures/fakes.js';

const januaryDates = Array.from(
  { length: 25 },
  (_, index) => `1990-01-${String(index + 1).padStart(2, '0')}`
);

const seededRepo = () =>
  makeFakeWeatherRepo({
    observations: [
      ...januaryDates.map((date) => makeObservation({ date })),
      makeObservation({ stationId: 'USC00000001', date: '1990-01-05' }),
    ],
    annualStats: [
      makeAnnualStat({ year: 1991 }),
      makeAnnualStat({ year: 1990 }),
      makeAnnualStat({ stationId: 'USC00000001', year: 1990, avgMaxTemp: null }),
    ],
  });

describe('listObservations', () => {
  it('returns the first page with defaults', async () => {
    const result = await listObservations({ weatherRepo: seededRepo() }, { filter: {} });

    const { data, pagination } = result._unsafeUnwrap();
    expect(pagination).toEqual({ page: 1, pageSize: 100, totalPages: 1, totalRecords: 26 });
    expect(data).toHaveLength(26);
    // Ordered by station, then date
    expect(data[0]).toEqual(makeObservation({ stationId: 'USC00000001', date: '1990-01-05' }));
    expect(data[1]?.date).toBe('1990-01-01');
  });

  it('filters by station and paginates', async () => {
    const result = await listObservations(
      { weatherRepo: seededRepo() },
      { filter: { stationId: 'USC00110072' }, page: 3, pageSize: 10 }
    );

    const { data, pagination } = result._unsafeUnwrap();
    expect(pagination).toEqual({ page: 3, pageSize: 10, totalPages: 3, totalRecords: 25 });
    expect(data.map((o) => o.date)).toEqual([
      '1990-01-21',
      '1990-01-22',
      '1990-01-23',
      '1990-01-24',
      '1990-01-25',
    ]);
  });

  it('filters by date', async () => {
    const result = await listObservations(
      { weatherRepo: seededRepo() },
      { filter: { date: '1990-01-05' } }
    );

    const { data } = result._unsafeUnwrap();
    expect(data.map((o) => o.stationId)).toEqual(['USC00000001', 'USC00110072']);
  });

  it('clamps out-of-range pagination', async () => {
    const weatherRepo = seededRepo();

    const small = await listObservations({ weatherRepo }, { filter: {}, page: 0, pageSize: 0 });
    expect(small._unsafeUnwrap().pagination).toEqual({
      page: 1,
      pageSize: 1,
      totalPages: 26,
      totalRecords: 26,
    });

    const large = await listObservations({ weatherRepo }, { filter: {}, pageSize: 5000 });
    expect(large._unsafeUnwrap().pagination.pageSize).toBe(1000);
  });

  it('returns an empty page past the end with the real total', async () => {
    const result = await listObservations(
      { weatherRepo: seededRepo() },
      { filter: {}, page: 9, pageSize: 10 }
    );

    const { data, pagination } = result._unsafeUnwrap();
    expect(data).toEqual([]);
    expect(pagination.totalRecords).toBe(26);
    expect(pagination.totalPages).toBe(3);
  });

  it('rejects a malformed station id', async () => {
    const result = await listObservations(
      { weatherRepo: seededRepo() },
      { filter: { stationId: 'US' } }
    );

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'InvalidInputError',
      message: 'station_id must be 3 to 32 characters of letters, digits, underscores or hyphens',
      field: 'station_id',
    });
  });

  it.each(['1990-02-30', '19900101', '1700-01-01', '2101-01-01'])(
    'rejects the date %s',
    async (date) => {
      const result = await listObservations({ weatherRepo: seededRepo() }, { filter: { date } });

      const error = result._unsafeUnwrapErr();
      expect(error.type).toBe('InvalidInputError');
      expect(error.message).toBe('date must be a valid YYYY-MM-DD date between 1800 and 2100');
    }
  );

  it('passes storage failures through', async () => {
    const weatherRepo = makeFakeWeatherRepo({ simulateDbError: true });

    const result = await listObservations({ weatherRepo }, { filter: {} });

    expect(result._unsafeUnwrapErr().type).toBe('DatabaseError');
  });
});

describe('listAnnualStats', () => {
  it('returns statistics ordered by station and year', async () => {
    const result = await listAnnualStats({ weatherRepo: seededRepo() }, { filter: {} });

    const { data, pagination } = result._unsafeUnwrap();
    expect(pagination).toEqual({ page: 1, pageSize: 100, totalPages: 1, totalRecords: 3 });
    expect(data.map((s) => [s.stationId, s.year])).toEqual([
      ['USC00000001', 1990],
      ['USC00110072', 1990],
      ['USC00110072', 1991],
    ]);
    expect(data[0]?.avgMaxTemp).toBeNull();
  });

  it('filters by station and year', async () => {
    const result = await listAnnualStats(
      { weatherRepo: seededRepo() },
      { filter: { stationId: 'USC00110072', year: 1991 } }
    );

    const { data, pagination } = result._unsafeUnwrap();
    expect(data).toEqual([makeAnnualStat({ year: 1991 })]);
    expect(pagination.totalRecords).toBe(1);
  });

  it('reports zero pages when nothing matches', async () => {
    const result = await listAnnualStats(
      { weatherRepo: seededRepo() },
      { filter: { year: 2000 } }
    );

    expect(result._unsafeUnwrap().pagination).toEqual({
      page: 1,
      pageSize: 100,
      totalPages: 0,
      totalRecords: 0,
    });
  });

  it.each([1799, 2101, 1990.5])('rejects the year %s', async (year) => {
    const result = await listAnnualStats({ weatherRepo: seededRepo() }, { filter: { year } });

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'InvalidInputError',
      message: 'year must be between 1800 and 2100',
      field: 'year',
    });
  });
});
