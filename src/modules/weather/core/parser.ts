/**
 * Record Parser
 *
 * Turns one raw line of a station file into an Observation.
 * Line format: YYYYMMDD<TAB>max_temp<TAB>min_temp<TAB>precipitation
 */

import path from 'node:path';

import { ok, err, type Result } from 'neverthrow';

import { createMalformedRecordError, type MalformedRecordError } from './errors.js';
import {
  MAX_STATION_ID_LENGTH,
  RECORD_FIELD_COUNT,
  STATION_ID_PATTERN,
  type Observation,
} from './types.js';

const COMPACT_DATE_PATTERN = /^(\d{4})(\d{2})(\d{2})$/;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

// Values are stored in 32-bit integer columns
const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const;

const pad = (value: number, width: number): string => String(value).padStart(width, '0');

const isLeapYear = (year: number): boolean =>
  (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;

const daysInMonth = (year: number, month: number): number =>
  month === 2 && isLeapYear(year) ? 29 : (DAYS_IN_MONTH[month - 1] ?? 0);

/**
 * Converts a compact YYYYMMDD date into ISO 8601 (YYYY-MM-DD).
 * Returns null unless the input is a real calendar date.
 */
export const toIsoDate = (compact: string): string | null => {
  const match = COMPACT_DATE_PATTERN.exec(compact);
  if (match === null) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  if (year < 1 || month < 1 || month > 12 || day < 1) {
    return null;
  }

  if (day > daysInMonth(year, month)) {
    return null;
  }

  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
};

/**
 * Checks that a value is a real calendar date written as YYYY-MM-DD.
 */
export const isIsoDate = (value: string): boolean => {
  const match = ISO_DATE_PATTERN.exec(value);
  return match !== null && toIsoDate(`${match[1] ?? ''}${match[2] ?? ''}${match[3] ?? ''}`) !== null;
};

/**
 * Parses a base-10 integer that fits a 32-bit column.
 */
export const parseInteger = (raw: string): number | null => {
  if (!INTEGER_PATTERN.test(raw)) {
    return null;
  }

  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < INT32_MIN || value > INT32_MAX) {
    return null;
  }

  return value;
};

export const isValidStationId = (stationId: string): boolean =>
  stationId.length > 0 &&
  stationId.length <= MAX_STATION_ID_LENGTH &&
  STATION_ID_PATTERN.test(stationId);

/**
 * Station id of a data file: its base name without the extension.
 *
 * @example
 * stationIdFromPath('data/wx_data/USC00110072.txt') // 'USC00110072'
 */
export const stationIdFromPath = (filePath: string): string =>
  path.basename(filePath, path.extname(filePath));

/**
 * Parses one record line for a station.
 * Never throws; every failure is returned as a MalformedRecordError.
 */
export const parseObservationLine = (
  line: string,
  stationId: string
): Result<Observation, MalformedRecordError> => {
  const fields = line.split('\t').map((field) => field.trim());

  if (fields.length !== RECORD_FIELD_COUNT) {
    return err(
      createMalformedRecordError(
        'field_count',
        stationId,
        line,
        `Expected ${String(RECORD_FIELD_COUNT)} tab-separated fields, got ${String(fields.length)}`
      )
    );
  }

  const [rawDate = '', rawMaxTemp = '', rawMinTemp = '', rawPrecipitation = ''] = fields;

  const date = toIsoDate(rawDate);
  if (date === null) {
    return err(
      createMalformedRecordError('invalid_date', stationId, line, `Invalid date '${rawDate}'`)
    );
  }

  const maxTemp = parseInteger(rawMaxTemp);
  const minTemp = parseInteger(rawMinTemp);
  const precipitation = parseInteger(rawPrecipitation);

  if (maxTemp === null || minTemp === null || precipitation === null) {
    return err(
      createMalformedRecordError(
        'invalid_number',
        stationId,
        line,
        `Invalid numeric values '${rawMaxTemp}', '${rawMinTemp}', '${rawPrecipitation}'`
      )
    );
  }

  return ok({ stationId, date, maxTemp, minTemp, precipitation });
};
