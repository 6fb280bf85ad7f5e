/**
 * Traversal Engine
 *
 * Walks a (source, destination) pair, dispatching on the destination shape.
 * Each node is resolved by the first rule that applies:
 *
 * 1. record destination, optional source: dereference (empty becomes a zero instance)
 * 2. custom mappers, in registration order
 * 3. optional destination
 * 4. identical type: copy by value
 * 5. timestamp to timestamp
 * 6. record destination: map field by field
 * 7. scalar coercions
 * 8. sequence destination
 * 9. otherwise incompatible
 */

import { coerceScalar } from './coercion';
import { findSourceField } from './field-resolver';
import {
	FieldMappingError,
	IncompatibleTypesError,
	MapperError,
	MapperUsageError,
	MissingSourceFieldError
} from './mapper-error';
import {
	copyValue,
	describeShape,
	isEmptyValue,
	isRecordValue,
	isSameType,
	writeOwn,
	zeroRecord,
	zeroValue
} from './shape';
import { propertySlot, valueSlot } from './typed';
import type { MapContext } from './map-context';
import type { DestinationSlot } from './mapper-types';
import type { FieldDef, RecordShape, SequenceShape, Shape } from './types';

export function mapValues(
	ctx: MapContext,
	source: unknown,
	sourceShape: Shape,
	dest: DestinationSlot,
	destShape: Shape
): void {
	if (destShape.kind === 'record' && sourceShape.kind === 'optional') {
		// An empty source still yields a zero instance, so custom mappers run on it
		// and nested defaults are produced.
		source = isEmptyValue(source) ? zeroValue(sourceShape.inner) : source;
		sourceShape = sourceShape.inner;
	}

	for (const customMapper of ctx.config.customMappers) {
		if (customMapper(source, sourceShape, dest, destShape)) {
			return;
		}
	}

	if (destShape.kind === 'optional') {
		if (sourceShape.kind === 'optional') {
			if (isEmptyValue(source)) {
				return;
			}
			sourceShape = sourceShape.inner;
		}
		const target = valueSlot(zeroValue(destShape.inner));
		mapValues(ctx, source, sourceShape, target, destShape.inner);
		dest.set(target.get());
		return;
	}

	if (isSameType(sourceShape, destShape)) {
		dest.set(copyValue(destShape, source));
		return;
	}

	// Timestamps are the only conversion hard-coded between non-identical shapes.
	// Anything else belongs in a custom mapper.
	if (destShape.kind === 'timestamp' && sourceShape.kind === 'timestamp') {
		dest.set(copyValue(destShape, source));
		return;
	}

	if (destShape.kind === 'record') {
		if (sourceShape.kind !== 'record') {
			ctx.reportIncompatible(new IncompatibleTypesError(describeShape(sourceShape), describeShape(destShape)));
			return;
		}
		mapRecord(ctx, source, sourceShape, dest, destShape);
		return;
	}

	if (sourceShape.kind === 'scalar' && destShape.kind === 'scalar') {
		let coerced: number | undefined;
		try {
			coerced = coerceScalar(source, sourceShape.scalar, destShape.scalar);
		} catch (error) {
			if (!(error instanceof MapperError)) throw error;
			ctx.reportIncompatible(
				new IncompatibleTypesError(describeShape(sourceShape), describeShape(destShape), error.message)
			);
			return;
		}
		if (coerced !== undefined) {
			dest.set(coerced);
			return;
		}
	}

	if (destShape.kind === 'sequence' && sourceShape.kind === 'sequence') {
		mapSequence(ctx, source, sourceShape, dest, destShape);
		return;
	}

	ctx.reportIncompatible(new IncompatibleTypesError(describeShape(sourceShape), describeShape(destShape)));
}

/**
 * Map every destination field in declaration order.
 */
function mapRecord(
	ctx: MapContext,
	source: unknown,
	sourceShape: RecordShape,
	dest: DestinationSlot,
	destShape: RecordShape
): void {
	const current = dest.get();
	const target = isRecordValue(current) ? current : zeroRecord(destShape);
	if (target !== current) {
		dest.set(target);
	}
	const sourceRecord = isRecordValue(source) ? source : zeroRecord(sourceShape);

	for (const field of destShape.fields) {
		ctx.enter(field.name);
		mapField(ctx, sourceRecord, sourceShape, target, destShape, field);
		ctx.leave();
	}
}

/**
 * Map one destination field. Failures thrown inside the field are re-reported
 * with the field name and both record types.
 */
function mapField(
	ctx: MapContext,
	source: Record<string, unknown>,
	sourceShape: RecordShape,
	target: Record<string, unknown>,
	destShape: RecordShape,
	field: FieldDef
): void {
	if (!Object.hasOwn(target, field.name)) {
		writeOwn(target, field.name, zeroValue(field.shape));
	}

	try {
		const sourceField = findSourceField(ctx, source, sourceShape, field);
		if (!sourceField) {
			return;
		}
		mapValues(ctx, sourceField.value, sourceField.shape, propertySlot(target, field.name), field.shape);
	} catch (error) {
		if (error instanceof MissingSourceFieldError || error instanceof MapperUsageError) {
			throw error;
		}
		const reason = error instanceof Error ? error.message : String(error);
		ctx.reportIncompatible(
			new FieldMappingError(field.name, describeShape(destShape), describeShape(sourceShape), reason)
		);
	}
}

/**
 * Map a sequence element by element, index i to index i.
 *
 * An empty source still maps one synthetic zero element so incompatible
 * element types fail now rather than on the first non-empty input.
 * The synthetic values are discarded; their failures are kept.
 */
export function mapSequence(
	ctx: MapContext,
	source: unknown,
	sourceShape: SequenceShape,
	dest: DestinationSlot,
	destShape: SequenceShape
): void {
	const items: unknown[] = Array.isArray(source) ? source : [];

	const target = items.map((item) => {
		const element = valueSlot(zeroValue(destShape.element));
		mapValues(ctx, item, sourceShape.element, element, destShape.element);
		return element.get();
	});

	if (items.length === 0) {
		const probe = valueSlot(zeroValue(destShape.element));
		mapValues(ctx, zeroValue(sourceShape.element), sourceShape.element, probe, destShape.element);
	}

	dest.set(target);
}
