/**
 * Mapper Type Definitions
 *
 * Options, hooks and the resolved configuration of a structural mapper.
 * This file contains no runtime code - only type definitions.
 */

import type { Logger } from '@shapemap/logging';
import type { Shape } from './types';

// --- DESTINATION SLOTS ---

/**
 * A writable location in the destination: a record property, a sequence
 * element, a Ref or the top-level destination object.
 */
export interface DestinationSlot {
	get(): unknown;
	set(value: unknown): void;
}

// --- CUSTOM MAPPERS ---

/**
 * Caller-supplied conversion consulted at every traversal node before the
 * built-in rules. Returns true when it has written the destination itself.
 *
 * @example
 * ```typescript
 * const isoDates: CustomMapper = (source, sourceShape, dest, destShape) => {
 *   if (sourceShape.kind !== 'timestamp' || destShape.kind !== 'scalar' || destShape.scalar !== 'string') {
 *     return false;
 *   }
 *   dest.set(source instanceof Date ? source.toISOString() : '');
 *   return true;
 * };
 * ```
 */
export type CustomMapper = (source: unknown, sourceShape: Shape, dest: DestinationSlot, destShape: Shape) => boolean;

// --- OPTIONS ---

/**
 * Matching and failure policy of a mapper.
 */
export interface MapperOptions {
	/** Throw when a destination field has no source counterpart (default: true) */
	failOnMissingSourceField?: boolean;
	/** Throw when no rule converts a source value into its destination (default: true) */
	failOnIncompatibleTypes?: boolean;
	/** Source field name -> destination field name, compared after normalization */
	fieldRenames?: Record<string, string>;
	/** Compare field names case-insensitively */
	ignoreCase?: boolean;
	/** Compare field names case-insensitively and without underscores (wins over ignoreCase) */
	fuzzyMatch?: boolean;
	/** Tag key whose value names source fields */
	sourceTagKey?: string;
	/** Tag key whose value names destination fields */
	destTagKey?: string;
	/** Hooks consulted in order at every node */
	customMappers?: CustomMapper[];
	/** Destination fields that are skipped without a missing report */
	ignoredDestinationFields?: string[];
	/** Logger for mapping diagnostics (default: new Logger('Mapper')) */
	logger?: Logger;
}

// --- MAP INPUTS AND OUTPUTS ---

/**
 * A value bound to its shape.
 */
export interface Typed<T = unknown> {
	readonly shape: Shape;
	readonly value: T;
}

/**
 * A freshly created destination together with the outcome of mapping into it.
 */
export interface MappedValue<T, R> {
	readonly value: T;
	readonly result: R;
}

// --- INTERNAL CONFIG TYPES ---

/**
 * @internal - Frozen configuration a mapper runs with.
 * Rename pairs and ignored names are already normalized.
 */
export interface MapperConfig {
	readonly failOnMissingSourceField: boolean;
	readonly failOnIncompatibleTypes: boolean;
	readonly ignoreCase: boolean;
	readonly fuzzyMatch: boolean;
	/** [normalized source name, normalized destination name] in insertion order */
	readonly fieldRenames: readonly (readonly [string, string])[];
	readonly sourceTagKey: string | undefined;
	readonly destTagKey: string | undefined;
	readonly customMappers: readonly CustomMapper[];
	readonly ignoredDestinationFields: ReadonlySet<string>;
	readonly logger: Logger;
}
