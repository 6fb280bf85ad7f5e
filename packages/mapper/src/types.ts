/**
 * Shape Types
 *
 * Runtime descriptors for the values the mapper walks.
 * Shapes are declared once with the field builders and are never mutated.
 * Builders carry the TypeScript value type so mapped values stay typed.
 */

// --- Scalar Kinds ---

export type IntegerKind = 'int' | 'int8' | 'int16' | 'int32' | 'int64';

export type UnsignedKind = 'uint' | 'uint8' | 'uint16' | 'uint32' | 'uint64';

export type FloatKind = 'float32' | 'float64';

export type ScalarKind = IntegerKind | UnsignedKind | FloatKind | 'string' | 'bool';

// --- Shapes ---

export interface ScalarShape {
	readonly kind: 'scalar';
	readonly scalar: ScalarKind;
}

/**
 * The platform timestamp (`Date`).
 */
export interface TimestampShape {
	readonly kind: 'timestamp';
}

/**
 * A reference that may be empty (`undefined` or `null`).
 */
export interface OptionalShape {
	readonly kind: 'optional';
	readonly inner: Shape;
}

export interface SequenceShape {
	readonly kind: 'sequence';
	readonly element: Shape;
}

/**
 * A named record with an ordered set of fields.
 * Two record shapes are the same type only when they are the same object.
 */
export interface RecordShape {
	readonly kind: 'record';
	readonly name: string;
	readonly fields: readonly FieldDef[];
}

export type Shape = ScalarShape | TimestampShape | OptionalShape | SequenceShape | RecordShape;

// --- Field Definition ---

/**
 * Defines a single field of a record.
 */
export interface FieldDef {
	/** Declared field name (the property key on record values) */
	readonly name: string;
	/** Shape of the field value */
	readonly shape: Shape;
	/** Alternate-name metadata keyed by tag (e.g. json -> 'first_name,omitempty') */
	readonly tags: ReadonlyMap<string, string>;
	/** Fields of an embedded record are promoted for name resolution */
	readonly embedded: boolean;
}

/**
 * Field definition before it is placed in a record (the name comes from the key).
 */
export interface FieldSpec {
	readonly shape: Shape;
	readonly tags: ReadonlyMap<string, string>;
	readonly embedded: boolean;
}

// --- Field Builders ---

/**
 * Base builder interface for field configuration.
 * Type parameter T represents the field's runtime type.
 */
export interface FieldBuilder<T = unknown> {
	/** Internal field definition - readonly access for inspection */
	readonly _def: FieldSpec;

	/** Wrap the field in an optional reference */
	optional(): FieldBuilder<T | undefined>;

	/** Attach alternate-name metadata under a tag key */
	tag(key: string, value: string): FieldBuilder<T>;
}

/**
 * Record field builder. Only record fields can be embedded.
 */
export interface RecordFieldBuilder<T> extends FieldBuilder<T> {
	tag(key: string, value: string): RecordFieldBuilder<T>;

	/** Promote this record's fields into the enclosing record for name resolution */
	embedded(): RecordFieldBuilder<T>;
}

/**
 * Input type for defining a record's fields.
 */
export type RecordFieldsInput = Record<string, FieldBuilder>;

// --- Record Types ---

/**
 * A named record shape produced by Mapper.defineRecord().
 */
export interface RecordType<F extends RecordFieldsInput = RecordFieldsInput> extends RecordShape {
	/** The builders the record was defined from */
	readonly $fields: Readonly<F>;

	/** Create a value with every field at its zero value */
	zero(): RecordValue<F>;
}

// --- Utility Types ---

/**
 * Extract the runtime type from a FieldBuilder.
 */
export type FieldValue<F> = F extends FieldBuilder<infer T> ? T : never;

/**
 * Extract the runtime value type of a record definition.
 */
export type RecordValue<F> =
	F extends RecordType<infer I>
		? { [K in keyof I]: FieldValue<I[K]> }
		: { [K in keyof F]: FieldValue<F[K]> };
