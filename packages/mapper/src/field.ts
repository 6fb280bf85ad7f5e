/**
 * Field Builders
 *
 * Factory functions for creating type-safe field definitions.
 * The declared field name is the property key the builder is placed under.
 *
 * @example
 * ```typescript
 * const Contact = Mapper.defineRecord('Contact', {
 *   phoneNumber: field.string().tag('json', 'phone_number'),
 *   extension: field.uint16().optional(),
 * });
 *
 * const Student = Mapper.defineRecord('Student', {
 *   id: field.int64(),
 *   contact: field.record(Contact),
 *   grades: field.list(field.float32()),
 *   enrolledAt: field.timestamp(),
 * });
 * ```
 */

import { scalarShape, timestampShape } from './shape';
import type {
	FieldBuilder,
	FieldSpec,
	RecordFieldBuilder,
	RecordFieldsInput,
	RecordType,
	RecordValue,
	ScalarKind,
	Shape
} from './types';

// --- Internal Builder Implementation ---

/**
 * Internal builder class implementing the fluent API.
 * Returns new instances for immutability.
 */
class FieldBuilderInternal<T> implements RecordFieldBuilder<T> {
	public readonly _def: FieldSpec;

	public constructor(
		shape: Shape,
		tags: ReadonlyMap<string, string> = new Map(),
		embedded: boolean = false
	) {
		this._def = { shape, tags, embedded };
	}

	public optional(): FieldBuilderInternal<T | undefined> {
		// Promotion only applies to plain records, so an optional field is never embedded
		return new FieldBuilderInternal<T | undefined>({ kind: 'optional', inner: this._def.shape }, this._def.tags);
	}

	public tag(key: string, value: string): FieldBuilderInternal<T> {
		const tags = new Map(this._def.tags);
		tags.set(key, value);
		return new FieldBuilderInternal<T>(this._def.shape, tags, this._def.embedded);
	}

	public embedded(): FieldBuilderInternal<T> {
		return new FieldBuilderInternal<T>(this._def.shape, this._def.tags, true);
	}
}

function scalar<T>(kind: ScalarKind): FieldBuilder<T> {
	return new FieldBuilderInternal<T>(scalarShape(kind));
}

// --- Public API ---

/**
 * Field builder factory.
 *
 * Each method starts a field of the named shape. Integer and floating kinds
 * hold JS numbers; `int` and `uint` are 64 bits wide.
 */
export const field = {
	int: (): FieldBuilder<number> => scalar('int'),
	int8: (): FieldBuilder<number> => scalar('int8'),
	int16: (): FieldBuilder<number> => scalar('int16'),
	int32: (): FieldBuilder<number> => scalar('int32'),
	int64: (): FieldBuilder<number> => scalar('int64'),
	uint: (): FieldBuilder<number> => scalar('uint'),
	uint8: (): FieldBuilder<number> => scalar('uint8'),
	uint16: (): FieldBuilder<number> => scalar('uint16'),
	uint32: (): FieldBuilder<number> => scalar('uint32'),
	uint64: (): FieldBuilder<number> => scalar('uint64'),
	float32: (): FieldBuilder<number> => scalar('float32'),
	float64: (): FieldBuilder<number> => scalar('float64'),
	string: (): FieldBuilder<string> => scalar('string'),
	bool: (): FieldBuilder<boolean> => scalar('bool'),

	/** The platform timestamp (`Date`) */
	timestamp(): FieldBuilder<Date> {
		return new FieldBuilderInternal<Date>(timestampShape);
	},

	/**
	 * A sequence whose elements have the shape of the given builder.
	 * Tags on the element builder are ignored.
	 */
	list<T>(element: FieldBuilder<T>): FieldBuilder<T[]> {
		return new FieldBuilderInternal<T[]>({ kind: 'sequence', element: element._def.shape });
	},

	/** A nested record of a defined record type */
	record<F extends RecordFieldsInput>(type: RecordType<F>): RecordFieldBuilder<RecordValue<F>> {
		return new FieldBuilderInternal<RecordValue<F>>(type);
	}
};
