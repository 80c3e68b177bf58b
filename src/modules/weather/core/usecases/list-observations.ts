/**
 * List Observations Use Case
 *
 * Paginated read of raw observations, ordered by station and date.
 */

import { ok, err, type Result } from 'neverthrow';

import { countPages, normalizePagination } from '../../../../common/constants/pagination.js';
import { validateObservationFilter } from '../filters.js';

import type { QueryError } from '../errors.js';
import type { WeatherRepository } from '../ports.js';
import type { Observation, ObservationFilter, Paginated } from '../types.js';

export interface ListObservationsDeps {
  weatherRepo: WeatherRepository;
}

export interface ListObservationsInput {
  filter: ObservationFilter;
  page?: number;
  pageSize?: number;
}

/**
 * Lists observations matching the filter.
 *
 * - Rejects malformed station ids and dates
 * - Clamps page to >= 1 and pageSize to [1, MAX_PAGE_SIZE]
 */
export async function listObservations(
  deps: ListObservationsDeps,
  input: ListObservationsInput
): Promise<Result<Paginated<Observation>, QueryError>> {
  const filterResult = validateObservationFilter(input.filter);
  if (filterResult.isErr()) {
    return err(filterResult.error);
  }

  const { page, pageSize } = normalizePagination(input);

  const pageResult = await deps.weatherRepo.queryObservations(filterResult.value, {
    page,
    pageSize,
  });
  if (pageResult.isErr()) {
    return err(pageResult.error);
  }

  const { rows, totalCount } = pageResult.value;
  return ok({
    data: rows,
    pagination: {
      page,
      pageSize,
      totalPages: countPages(totalCount, pageSize),
      totalRecords: totalCount,
    },
  });
}
