/**
 * List Annual Stats Use Case
 *
 * Paginated read of the derived annual statistics, ordered by station and year.
 */

import { ok, err, type Result } from 'neverthrow';

import { countPages, normalizePagination } from '../../../../common/constants/pagination.js';
import { validateAnnualStatFilter } from '../filters.js';

import type { QueryError } from '../errors.js';
import type { WeatherRepository } from '../ports.js';
import type { AnnualStat, AnnualStatFilter, Paginated } from '../types.js';

export interface ListAnnualStatsDeps {
  weatherRepo: WeatherRepository;
}

export interface ListAnnualStatsInput {
  filter: AnnualStatFilter;
  page?: number;
  pageSize?: number;
}

export async function listAnnualStats(
  deps: ListAnnualStatsDeps,
  input: ListAnnualStatsInput
): Promise<Result<Paginated<AnnualStat>, QueryError>> {
  const filterResult = validateAnnualStatFilter(input.filter);
  if (filterResult.isErr()) {
    return err(filterResult.error);
  }

  const { page, pageSize } = normalizePagination(input);

  const pageResult = await deps.weatherRepo.queryAnnualStats(filterResult.value, {
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
