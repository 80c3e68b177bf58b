import { describe, it, expect } from 'vitest';

import { ingestWeatherData } from '@/modules/weather/core/usecases/ingest-weather-data.js';

import { SAMPLE_LINES } from '../../fixtures/builders.js';
import {
  makeFakeStationFileSource,
  makeFakeWeatherRepo,
  makeSilentLogger,
  type FakeStationFileSourceOptions,
  type FakeWeatherRepo,
} from '../../fixtures/fakes.js';

const STATION_A = ['19850101\t10\t-5\t0', '19850102\t12\t-3\t20'];
const STATION_B = SAMPLE_LINES.join('\n');

const dataDirOptions = (): FakeStationFileSourceOptions => ({
  directories: {
    data: ['USC00110072.txt', 'readme.md', 'USC00000001.txt'],
  },
  files: {
    'data/USC00000001.txt': STATION_A.join('\n'),
    'data/USC00110072.txt': STATION_B,
    'data/readme.md': 'not a station file',
  },
});

const makeDeps = (
  options: FakeStationFileSourceOptions,
  weatherRepo: FakeWeatherRepo = makeFakeWeatherRepo()
) => ({
  weatherRepo,
  files: makeFakeStationFileSource(options),
  logger: makeSilentLogger(),
});

describe('ingestWeatherData', () => {
  describe('directory input', () => {
    it('ingests every .txt file in lexicographic order', async () => {
      const deps = makeDeps(dataDirOptions());

      const stats = (await ingestWeatherData(deps, { inputPath: 'data' }))._unsafeUnwrap();

      expect(stats.inputPath).toBe('data');
      expect(stats.filesProcessed).toBe(2);
      expect(stats.filesSuccessful).toBe(2);
      expect(stats.filesFailed).toBe(0);
      expect(stats.fileStats.map((file) => file.stationId)).toEqual([
        'USC00000001',
        'USC00110072',
      ]);
      expect(stats.totalRecordsProcessed).toBe(5);
      expect(stats.totalRecordsIngested).toBe(5);
      expect(stats.totalRecordsSkipped).toBe(0);
      expect(stats.totalErrors).toBe(0);
      expect(deps.weatherRepo.observations.size).toBe(5);
    });

    it('is idempotent across runs', async () => {
      const weatherRepo = makeFakeWeatherRepo();
      const deps = makeDeps(dataDirOptions(), weatherRepo);

      const first = (await ingestWeatherData(deps, { inputPath: 'data' }))._unsafeUnwrap();
      const second = (await ingestWeatherData(deps, { inputPath: 'data' }))._unsafeUnwrap();

      expect(first.totalRecordsIngested).toBe(5);
      expect(second.totalRecordsIngested).toBe(0);
      expect(second.totalRecordsSkipped).toBe(first.totalRecordsIngested);
      expect(weatherRepo.observations.size).toBe(5);
    });

    it('records a failing file and continues with the rest', async () => {
      const options = dataDirOptions();
      options.files = {
        ...options.files,
        'data/USC00000001.txt': new Error('EISDIR: illegal operation on a directory'),
      };
      const deps = makeDeps(options);

      const stats = (await ingestWeatherData(deps, { inputPath: 'data' }))._unsafeUnwrap();

      expect(stats.filesProcessed).toBe(2);
      expect(stats.filesSuccessful).toBe(1);
      expect(stats.filesFailed).toBe(1);
      expect(stats.failedFiles).toHaveLength(1);
      expect(stats.failedFiles[0]?.filePath).toBe('data/USC00000001.txt');
      expect(stats.failedFiles[0]?.error.type).toBe('FileReadError');
      expect(stats.totalRecordsIngested).toBe(3);
      expect(deps.weatherRepo.observations.size).toBe(3);
    });

    it('keeps going after a file is rolled back by a storage failure', async () => {
      const weatherRepo = makeFakeWeatherRepo({ failDates: ['1985-01-02'] });
      const deps = makeDeps(dataDirOptions(), weatherRepo);

      const stats = (await ingestWeatherData(deps, { inputPath: 'data' }))._unsafeUnwrap();

      expect(stats.filesFailed).toBe(1);
      expect(stats.failedFiles[0]?.error.type).toBe('DatabaseError');
      expect(stats.filesSuccessful).toBe(1);
      expect(weatherRepo.observations.size).toBe(3);
      expect(weatherRepo.observations.has('USC00000001|1985-01-01')).toBe(false);
    });

    it('adds up line errors across files', async () => {
      const options = dataDirOptions();
      options.files = {
        ...options.files,
        'data/USC00000001.txt': [...STATION_A, 'bad line'].join('\n'),
      };
      const deps = makeDeps(options);

      const stats = (await ingestWeatherData(deps, { inputPath: 'data' }))._unsafeUnwrap();

      expect(stats.totalRecordsProcessed).toBe(6);
      expect(stats.totalErrors).toBe(1);
      expect(stats.totalRecordsIngested).toBe(5);
    });
  });

  describe('single file input', () => {
    it('ingests the given file', async () => {
      const deps = makeDeps(dataDirOptions());

      const stats = (
        await ingestWeatherData(deps, { inputPath: 'data/USC00110072.txt' })
      )._unsafeUnwrap();

      expect(stats.filesProcessed).toBe(1);
      expect(stats.totalRecordsIngested).toBe(3);
    });

    it('rejects a file without the .txt extension', async () => {
      const deps = makeDeps(dataDirOptions());

      const error = (await ingestWeatherData(deps, { inputPath: 'data/readme.md' }))._unsafeUnwrapErr();

      expect(error).toEqual({
        type: 'InvalidInputError',
        message: 'Expected a .txt file, got data/readme.md',
        field: 'inputPath',
      });
    });
  });

  describe('unusable input', () => {
    it('fails with InputNotFoundError when the path does not exist', async () => {
      const deps = makeDeps(dataDirOptions());

      const error = (await ingestWeatherData(deps, { inputPath: 'missing' }))._unsafeUnwrapErr();

      expect(error.type).toBe('InputNotFoundError');
      expect(error.message).toBe('Input path not found: missing');
    });

    it('fails with InvalidInputError when a directory has no station files', async () => {
      const deps = makeDeps({ directories: { empty: ['notes.md'] } });

      const error = (await ingestWeatherData(deps, { inputPath: 'empty' }))._unsafeUnwrapErr();

      expect(error.type).toBe('InvalidInputError');
      expect(error.message).toBe('No weather data files found in empty');
      expect(deps.weatherRepo.commits).toBe(0);
    });

    it('fails with FileReadError when the directory cannot be listed', async () => {
      const deps = makeDeps({ directories: { locked: new Error('EACCES') } });

      const error = (await ingestWeatherData(deps, { inputPath: 'locked' }))._unsafeUnwrapErr();

      expect(error.type).toBe('FileReadError');
      expect(error.message).toBe('Failed to read locked: EACCES');
    });
  });
});
