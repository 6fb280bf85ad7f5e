/**
 * Shape Utilities
 *
 * Zero values, type identity, copies and display names for shapes.
 */

import type { RecordShape, ScalarKind, ScalarShape, Shape, TimestampShape } from './types';

const scalarShapes = new Map<ScalarKind, ScalarShape>();

/**
 * Shared scalar shape for a kind. Scalar shapes are interned so the
 * same kind always yields the same object.
 */
export function scalarShape(scalar: ScalarKind): ScalarShape {
	let shape = scalarShapes.get(scalar);
	if (!shape) {
		shape = Object.freeze<ScalarShape>({ kind: 'scalar', scalar });
		scalarShapes.set(scalar, shape);
	}
	return shape;
}

export const timestampShape: TimestampShape = Object.freeze<TimestampShape>({ kind: 'timestamp' });

/**
 * Type guard for record values (plain objects, not arrays or dates).
 */
export function isRecordValue(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * An optional reference is empty when it holds undefined or null.
 */
export function isEmptyValue(value: unknown): value is null | undefined {
	return value === undefined || value === null;
}

/**
 * Create the zero value of a shape.
 */
export function zeroValue(shape: Shape): unknown {
	switch (shape.kind) {
		case 'scalar':
			if (shape.scalar === 'string') return '';
			if (shape.scalar === 'bool') return false;
			return 0;
		case 'timestamp':
			return new Date(0);
		case 'optional':
			return undefined;
		case 'sequence':
			return [];
		case 'record':
			return zeroRecord(shape);
	}
}

/**
 * Read an own property of a record value. Inherited members such as
 * `constructor` read as absent.
 */
export function readOwn(record: Record<string, unknown>, key: string): unknown {
	return Object.hasOwn(record, key) ? record[key] : undefined;
}

/**
 * Define an own enumerable property. A key of `__proto__` becomes a plain
 * property and leaves the prototype alone.
 */
export function writeOwn(record: Record<string, unknown>, key: string, value: unknown): void {
	Object.defineProperty(record, key, { value, writable: true, enumerable: true, configurable: true });
}

export function zeroRecord(shape: RecordShape): Record<string, unknown> {
	const value: Record<string, unknown> = {};
	for (const field of shape.fields) {
		writeOwn(value, field.name, zeroValue(field.shape));
	}
	return value;
}

/**
 * Whether two shapes are the exact same type.
 * Scalars match by kind, records by identity. Other shapes never take
 * the identical-type path.
 *
 * A record mapped onto its own type is deep-copied whole, so
 * `ignoredDestinationFields` is not consulted for its fields.
 */
export function isSameType(source: Shape, dest: Shape): boolean {
	if (source.kind === 'scalar' && dest.kind === 'scalar') {
		return source.scalar === dest.scalar;
	}
	if (source.kind === 'record' && dest.kind === 'record') {
		return source === dest;
	}
	return false;
}

/**
 * Copy a value along its shape so the destination shares no mutable
 * state with the source.
 */
export function copyValue(shape: Shape, value: unknown): unknown {
	switch (shape.kind) {
		case 'scalar':
			return value ?? zeroValue(shape);
		case 'timestamp':
			return value instanceof Date ? new Date(value.getTime()) : zeroValue(shape);
		case 'optional':
			return isEmptyValue(value) ? undefined : copyValue(shape.inner, value);
		case 'sequence':
			return Array.isArray(value) ? value.map((item) => copyValue(shape.element, item)) : [];
		case 'record': {
			if (!isRecordValue(value)) return zeroRecord(shape);
			const copy: Record<string, unknown> = {};
			for (const field of shape.fields) {
				writeOwn(copy, field.name, copyValue(field.shape, readOwn(value, field.name)));
			}
			return copy;
		}
	}
}

/**
 * Human-readable type name used in error messages.
 */
export function describeShape(shape: Shape): string {
	switch (shape.kind) {
		case 'scalar':
			return shape.scalar;
		case 'timestamp':
			return 'timestamp';
		case 'optional':
			return `${describeShape(shape.inner)}?`;
		case 'sequence':
			return `${describeShape(shape.element)}[]`;
		case 'record':
			return shape.name;
	}
}
