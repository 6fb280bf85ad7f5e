/**
 * Mapper options schema.
 *
 * Options usually come from code, but they are checked at construction so a
 * misconfigured mapper fails before its first map call.
 */

import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { MapperUsageError } from './mapper-error';

export const MapperOptionsSchema = Type.Object({
	failOnMissingSourceField: Type.Optional(Type.Boolean()),
	failOnIncompatibleTypes: Type.Optional(Type.Boolean()),
	fieldRenames: Type.Optional(Type.Record(Type.String(), Type.String())),
	ignoreCase: Type.Optional(Type.Boolean()),
	fuzzyMatch: Type.Optional(Type.Boolean()),
	sourceTagKey: Type.Optional(Type.String({ minLength: 1 })),
	destTagKey: Type.Optional(Type.String({ minLength: 1 })),
	customMappers: Type.Optional(Type.Array(Type.Function([], Type.Boolean()))),
	ignoredDestinationFields: Type.Optional(Type.Array(Type.String()))
});

/**
 * Check options against the schema.
 *
 * @throws MapperUsageError listing every violation as "<path> <message>"
 */
export function assertValidOptions(options: unknown): void {
	const errors = [...Value.Errors(MapperOptionsSchema, options)];
	if (errors.length === 0) {
		return;
	}
	const details = errors.map((error) => `${error.path || '/'} ${error.message}`).join('; ');
	throw new MapperUsageError(`Invalid mapper options: ${details}`);
}
