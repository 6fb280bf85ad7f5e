/**
 * Mapper Errors
 *
 * Error classes for the three failure classes of a map call: usage errors,
 * missing source fields and incompatible types.
 *
 * @example
 * ```typescript
 * throw new FieldMappingError('age', 'Person', 'PersonDto', 'unsupported conversion (source string -> dest int)');
 * // FieldMappingError: Error mapping field: age. DestType: Person. SourceType: PersonDto. Error: unsupported ...
 * ```
 */

/**
 * Base class for every error raised by the mapper.
 */
export class MapperError extends Error {
	public override readonly name: string = 'MapperError';

	public constructor(message: string) {
		super(message);

		// Maintains proper stack trace for where error was thrown (V8 engines)
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, new.target);
		}
	}
}

/**
 * The caller broke the mapper's contract (non-reference destination, invalid options).
 * Always thrown, whatever the failure switches say.
 */
export class MapperUsageError extends MapperError {
	public override readonly name: string = 'MapperUsageError';
}

/**
 * One or more destination fields have no counterpart in the source.
 */
export class MissingSourceFieldError extends MapperError {
	public override readonly name: string = 'MissingSourceFieldError';

	/**
	 * @param paths - Dotted scope paths of the missing fields
	 */
	public constructor(public readonly paths: readonly string[]) {
		super(`Missing fields from source record: ${paths.join(', ')}`);
	}
}

/**
 * No rule converts the source shape into the destination shape.
 */
export class IncompatibleTypesError extends MapperError {
	public override readonly name: string = 'IncompatibleTypesError';

	public constructor(
		public readonly sourceType: string,
		public readonly destType: string,
		message: string = `unsupported conversion (source ${sourceType} -> dest ${destType}); register a custom mapper for this pair`
	) {
		super(message);
	}
}

/**
 * A failure inside one record field, re-reported with the field and both record types.
 */
export class FieldMappingError extends IncompatibleTypesError {
	public override readonly name: string = 'FieldMappingError';

	/**
	 * @param fieldName - Declared name of the destination field
	 * @param destType - Destination record type
	 * @param sourceType - Source record type
	 * @param reason - Message of the underlying failure
	 */
	public constructor(
		public readonly fieldName: string,
		destType: string,
		sourceType: string,
		public readonly reason: string
	) {
		super(
			sourceType,
			destType,
			`Error mapping field: ${fieldName}. DestType: ${destType}. SourceType: ${sourceType}. Error: ${reason}`
		);
	}
}
