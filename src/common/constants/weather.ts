/**
 * Weather Constants
 *
 * Limits shared by the storage schema and the query layer.
 */

/** Oldest observation year accepted by the store and the query filters */
export const MIN_OBSERVATION_YEAR = 1800;

/** Newest observation year accepted by the store and the query filters */
export const MAX_OBSERVATION_YEAR = 2100;
