/**
 * Structural Mapper
 *
 * Copies matching fields between differently shaped values, coercing numeric
 * widths and recursing into records, optionals and sequences.
 *
 * @example
 * ```typescript
 * import { Mapper, field, map, typed } from '@shapemap/mapper';
 *
 * const Records = Mapper.defineRecords({
 *   UserRow: { user_id: field.int64(), display_name: field.string() },
 *   User: { userId: field.int32(), displayName: field.string() },
 * });
 *
 * const mapper = Mapper.configure({ fuzzyMatch: true });
 * const { value } = mapper.create(typed(Records.UserRow, row), Records.User);
 * ```
 */

export { Mapper, map, resolveConfig } from './mapper';
export { MapperBuilder } from './mapper-builder';
export { StructMapper } from './struct-mapper';
export { MapResult, joinErrorMessages } from './map-result';
export { field } from './field';
export { Ref, ref, typed } from './typed';
export { normalizeName } from './field-resolver';
export { coerceScalar } from './coercion';
export { MapperOptionsSchema } from './options-schema';
export { describeShape, zeroValue } from './shape';

export type {
	CustomMapper,
	DestinationSlot,
	MapperOptions,
	MapperConfig,
	MappedValue,
	Typed
} from './mapper-types';

export type {
	Shape,
	ScalarShape,
	TimestampShape,
	OptionalShape,
	SequenceShape,
	RecordShape,
	RecordType,
	RecordValue,
	RecordFieldsInput,
	FieldBuilder,
	RecordFieldBuilder,
	FieldDef,
	FieldSpec,
	FieldValue,
	ScalarKind,
	IntegerKind,
	UnsignedKind,
	FloatKind
} from './types';

export {
	MapperError,
	MapperUsageError,
	MissingSourceFieldError,
	IncompatibleTypesError,
	FieldMappingError
} from './mapper-error';
