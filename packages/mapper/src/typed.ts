/**
 * Map inputs: values bound to shapes, and mutable references.
 */

import { isRecordValue, readOwn, writeOwn } from './shape';
import { MapperUsageError } from './mapper-error';
import type { DestinationSlot, Typed } from './mapper-types';
import type { FieldBuilder, Shape } from './types';

/**
 * A mutable reference to a destination value.
 *
 * @example
 * ```typescript
 * const count = ref<number>();
 * map(typed(field.int32(), 7), typed(field.int64(), count));
 * count.current; // 7
 * ```
 */
export class Ref<T = unknown> {
	public constructor(public current: T | undefined = undefined) {}
}

export function ref<T>(initial?: T): Ref<T> {
	return new Ref<T>(initial);
}

function isFieldBuilder(value: Shape | FieldBuilder): value is FieldBuilder {
	return '_def' in value;
}

/**
 * Bind a value to the shape it is declared with.
 * Accepts a shape (such as a record type) or a field builder.
 */
export function typed<T>(shape: Shape | FieldBuilder, value: T): Typed<T> {
	return { shape: isFieldBuilder(shape) ? shape._def.shape : shape, value };
}

/**
 * Slot over a standalone value.
 */
export function valueSlot(initial: unknown): DestinationSlot {
	let current = initial;
	return {
		get: () => current,
		set: (value) => {
			current = value;
		}
	};
}

/**
 * Slot over one property of a record value.
 */
export function propertySlot(target: Record<string, unknown>, key: string): DestinationSlot {
	return {
		get: () => readOwn(target, key),
		set: (value) => {
			writeOwn(target, key, value);
		}
	};
}

/**
 * Resolve the top-level destination into a slot.
 * A Ref is written through `current`; a record object is updated in place.
 *
 * @throws MapperUsageError when the destination is not a mutable reference
 */
export function destinationSlot(dest: Typed): DestinationSlot {
	const value = dest.value;

	if (value instanceof Ref) {
		return {
			get: () => value.current,
			set: (next) => {
				value.current = next;
			}
		};
	}

	if (dest.shape.kind === 'record' && isRecordValue(value)) {
		return {
			get: () => value,
			set: (next) => {
				if (next !== value && isRecordValue(next)) {
					for (const key of Object.keys(next)) {
						writeOwn(value, key, next[key]);
					}
				}
			}
		};
	}

	throw new MapperUsageError(
		'Destination must be a mutable reference: pass a record object for a record shape, or a Ref'
	);
}
