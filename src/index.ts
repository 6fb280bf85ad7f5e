/**
 * shapemap - structural mapping between differently shaped records
 *
 * This file re-exports all packages for convenience. Import directly from the
 * individual packages where only one is needed:
 *
 * @example
 * import { Mapper, field, typed } from '@shapemap/mapper';
 * import { Logger } from '@shapemap/logging';
 */

export * from '@shapemap/mapper';
export * from '@shapemap/logging';
