/**
 * Field Resolver
 *
 * Finds the source field that supplies a destination field, comparing
 * canonical names: the tag-derived or declared name, normalized per the
 * matching policy.
 */

import { isEmptyValue, isRecordValue, readOwn, zeroRecord, zeroValue } from './shape';
import type { MapContext } from './map-context';
import type { MapperConfig } from './mapper-types';
import type { FieldDef, RecordShape, Shape } from './types';

/**
 * A source field value together with its shape.
 */
export interface SourceField {
	readonly value: unknown;
	readonly shape: Shape;
}

/**
 * Normalize a field name: fuzzy matching lowercases and drops underscores,
 * ignoreCase only lowercases, otherwise the name is unchanged.
 */
export function normalizeName(config: Pick<MapperConfig, 'fuzzyMatch' | 'ignoreCase'>, name: string): string {
	if (config.fuzzyMatch) {
		return name.replace(/_/g, '').toLowerCase();
	}
	if (config.ignoreCase) {
		return name.toLowerCase();
	}
	return name;
}

/**
 * Tag value before the first comma when the tag key is configured and present,
 * otherwise the declared name.
 */
function taggedName(field: FieldDef, tagKey: string | undefined): string {
	if (tagKey) {
		const tag = field.tags.get(tagKey);
		if (tag !== undefined) {
			return tag.split(',')[0] ?? '';
		}
	}
	return field.name;
}

/**
 * Canonical destination name. A rename whose destination side matches
 * substitutes its source side.
 */
export function destinationFieldName(config: MapperConfig, field: FieldDef): string {
	const name = normalizeName(config, taggedName(field, config.destTagKey));
	for (const [sourceName, destName] of config.fieldRenames) {
		if (destName === name) {
			return sourceName;
		}
	}
	return name;
}

/**
 * Canonical source name. Renames never apply to source names.
 */
export function sourceFieldName(config: MapperConfig, field: FieldDef): string {
	return normalizeName(config, taggedName(field, config.sourceTagKey));
}

function readField(source: Record<string, unknown>, field: FieldDef): unknown {
	const value = readOwn(source, field.name);
	return isEmptyValue(value) ? zeroValue(field.shape) : value;
}

/**
 * Find the source field for a destination field.
 *
 * Direct fields are checked first in declaration order, then embedded
 * records are probed in order. A field found nowhere is reported as missing
 * on the current scope path; an ignored field is skipped silently.
 */
export function findSourceField(
	ctx: MapContext,
	source: Record<string, unknown>,
	sourceShape: RecordShape,
	destField: FieldDef
): SourceField | undefined {
	const destName = destinationFieldName(ctx.config, destField);
	if (ctx.config.ignoredDestinationFields.has(destName)) {
		return undefined;
	}

	for (const field of sourceShape.fields) {
		if (sourceFieldName(ctx.config, field) === destName) {
			return { value: readField(source, field), shape: field.shape };
		}
	}

	// Missing from one embedded record is not evidence that the field is missing,
	// so embedded probes report into a throwaway context.
	for (const field of sourceShape.fields) {
		if (!field.embedded || field.shape.kind !== 'record') continue;

		const embedded = readOwn(source, field.name);
		const found = findSourceField(
			ctx.probe(),
			isRecordValue(embedded) ? embedded : zeroRecord(field.shape),
			field.shape,
			destField
		);
		if (found) {
			return found;
		}
	}

	ctx.reportMissing();
	return undefined;
}
