/**
 * Query filter validation for the read use cases.
 */

import { ok, err, type Result } from 'neverthrow';

import {
  MAX_OBSERVATION_YEAR,
  MIN_OBSERVATION_YEAR,
} from '../../../common/constants/weather.js';
import { createInvalidInputError, type InvalidInputError } from './errors.js';
import { isIsoDate } from './parser.js';
import { QUERY_STATION_ID_PATTERN, type AnnualStatFilter, type ObservationFilter } from './types.js';

const isYearInRange = (year: number): boolean =>
  Number.isInteger(year) && year >= MIN_OBSERVATION_YEAR && year <= MAX_OBSERVATION_YEAR;

const validateStationId = (stationId: string | undefined): Result<void, InvalidInputError> => {
  if (stationId !== undefined && !QUERY_STATION_ID_PATTERN.test(stationId)) {
    return err(
      createInvalidInputError(
        'station_id',
        'station_id must be 3 to 32 characters of letters, digits, underscores or hyphens'
      )
    );
  }
  return ok(undefined);
};

export const validateObservationFilter = (
  filter: ObservationFilter
): Result<ObservationFilter, InvalidInputError> => {
  const stationCheck = validateStationId(filter.stationId);
  if (stationCheck.isErr()) {
    return err(stationCheck.error);
  }

  if (filter.date !== undefined) {
    const year = Number(filter.date.slice(0, 4));
    if (!isIsoDate(filter.date) || !isYearInRange(year)) {
      return err(
        createInvalidInputError(
          'date',
          `date must be a valid YYYY-MM-DD date between ${String(MIN_OBSERVATION_YEAR)} and ${String(MAX_OBSERVATION_YEAR)}`
        )
      );
    }
  }

  return ok(filter);
};

export const validateAnnualStatFilter = (
  filter: AnnualStatFilter
): Result<AnnualStatFilter, InvalidInputError> => {
  const stationCheck = validateStationId(filter.stationId);
  if (stationCheck.isErr()) {
    return err(stationCheck.error);
  }

  if (filter.year !== undefined && !isYearInRange(filter.year)) {
    return err(
      createInvalidInputError(
        'year',
        `year must be between ${String(MIN_OBSERVATION_YEAR)} and ${String(MAX_OBSERVATION_YEAR)}`
      )
    );
  }

  return ok(filter);
};
