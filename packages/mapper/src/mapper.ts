/**
 * Mapper Factory
 *
 * Factory for record definitions and configured mappers.
 *
 * @example
 * ```typescript
 * const Records = Mapper.defineRecords({
 *   Person: { name: field.string(), age: field.int32() },
 *   PersonDto: { name: field.string(), age: field.int64() },
 * });
 *
 * const person = { name: 'Ada', age: 36 };
 * const dto = Records.PersonDto.zero();
 * const result = map(typed(Records.Person, person), typed(Records.PersonDto, dto));
 * ```
 */

import { Logger } from '@shapemap/logging';
import { normalizeName } from './field-resolver';
import { MapperBuilder } from './mapper-builder';
import { assertValidOptions } from './options-schema';
import { zeroRecord } from './shape';
import { StructMapper } from './struct-mapper';
import type { MapResult } from './map-result';
import type { MapperConfig, MapperOptions, Typed } from './mapper-types';
import type { FieldDef, RecordFieldsInput, RecordType, RecordValue } from './types';

// --- RECORD PROCESSING ---

function buildRecord<F extends RecordFieldsInput>(name: string, input: F): RecordType<F> {
	const fields: FieldDef[] = Object.entries(input).map(([fieldName, builder]) =>
		Object.freeze({ name: fieldName, ...builder._def })
	);

	const record: RecordType<F> = {
		kind: 'record',
		name,
		fields: Object.freeze(fields),
		$fields: Object.freeze({ ...input }),
		zero(): RecordValue<F> {
			// The zero record carries every declared field, which is what RecordValue<F> describes
			return zeroRecord(record) as RecordValue<F>;
		}
	};

	return Object.freeze(record);
}

// --- CONFIGURATION ---

/**
 * Validate options and freeze them into the configuration a mapper runs with.
 */
export function resolveConfig(options: MapperOptions = {}): MapperConfig {
	assertValidOptions(options);

	const policy = { fuzzyMatch: options.fuzzyMatch ?? false, ignoreCase: options.ignoreCase ?? false };
	const fieldRenames = Object.entries(options.fieldRenames ?? {}).map(
		([sourceName, destName]) => [normalizeName(policy, sourceName), normalizeName(policy, destName)] as const
	);
	const ignored = new Set((options.ignoredDestinationFields ?? []).map((name) => normalizeName(policy, name)));

	return Object.freeze({
		...policy,
		failOnMissingSourceField: options.failOnMissingSourceField ?? true,
		failOnIncompatibleTypes: options.failOnIncompatibleTypes ?? true,
		fieldRenames: Object.freeze(fieldRenames),
		sourceTagKey: options.sourceTagKey,
		destTagKey: options.destTagKey,
		customMappers: Object.freeze([...(options.customMappers ?? [])]),
		ignoredDestinationFields: ignored,
		logger: options.logger ?? new Logger('Mapper')
	});
}

function configure(options: MapperOptions = {}): StructMapper {
	return new StructMapper(resolveConfig(options));
}

// --- PUBLIC API ---

/**
 * Mapper factory for record definitions and mappers.
 */
export const Mapper = {
	/**
	 * Define a named record type.
	 *
	 * @example
	 * ```typescript
	 * const Address = Mapper.defineRecord('Address', {
	 *   street: field.string(),
	 *   postCode: field.string().tag('json', 'post_code'),
	 * });
	 *
	 * Address.zero(); // { street: '', postCode: '' }
	 * ```
	 */
	defineRecord<F extends RecordFieldsInput>(name: string, fields: F): RecordType<F> {
		return buildRecord(name, fields);
	},

	/**
	 * Define several record types at once; each key becomes the record name.
	 */
	defineRecords<T extends Record<string, RecordFieldsInput>>(
		records: T
	): { readonly [K in keyof T]: RecordType<T[K]> } {
		const result: Record<string, RecordType> = {};

		for (const [name, fields] of Object.entries(records)) {
			result[name] = buildRecord(name, fields);
		}

		return Object.freeze(result) as { readonly [K in keyof T]: RecordType<T[K]> };
	},

	/**
	 * Create a mapper with the given policy. Both failure switches default to true.
	 *
	 * @throws MapperUsageError if the options are invalid
	 */
	configure,

	/**
	 * Start a fluent mapper configuration.
	 */
	builder(): MapperBuilder {
		return new MapperBuilder(configure);
	},

	/**
	 * Mapper with default policy: missing fields and incompatible types are fatal.
	 */
	default: configure()
};

/**
 * Map with the default mapper.
 *
 * @throws MapperUsageError if dest is not a mutable reference
 * @throws MissingSourceFieldError on the first destination field without a source
 * @throws IncompatibleTypesError on the first unconvertible pair
 */
export function map(source: Typed, dest: Typed): MapResult {
	return Mapper.default.map(source, dest);
}
