/**
 * Mapper Builder
 *
 * Fluent alternative to passing an options object to Mapper.configure().
 */

import type { Logger } from '@shapemap/logging';
import { MapperUsageError } from './mapper-error';
import type { CustomMapper, MapperOptions } from './mapper-types';
import type { StructMapper } from './struct-mapper';

/**
 * Collects options and produces a StructMapper.
 *
 * @example
 * ```typescript
 * const mapper = Mapper.builder()
 *   .fuzzyMatch()
 *   .rename('userId', 'id')
 *   .ignore('auditTrail')
 *   .failOnMissingSourceField(false)
 *   .build();
 * ```
 */
export class MapperBuilder {
	private readonly options: MapperOptions = {};
	private readonly renames: Record<string, string> = {};
	private readonly renamedDestinations = new Set<string>();
	private readonly ignored: string[] = [];
	private readonly customMappers: CustomMapper[] = [];

	public constructor(private readonly factory: (options: MapperOptions) => StructMapper) {}

	public failOnMissingSourceField(enabled: boolean = true): this {
		this.options.failOnMissingSourceField = enabled;
		return this;
	}

	public failOnIncompatibleTypes(enabled: boolean = true): this {
		this.options.failOnIncompatibleTypes = enabled;
		return this;
	}

	public ignoreCase(): this {
		this.options.ignoreCase = true;
		return this;
	}

	public fuzzyMatch(): this {
		this.options.fuzzyMatch = true;
		return this;
	}

	public sourceTag(key: string): this {
		this.options.sourceTagKey = key;
		return this;
	}

	public destTag(key: string): this {
		this.options.destTagKey = key;
		return this;
	}

	/**
	 * Fill the destination field `destName` from the source field `sourceName`.
	 * Throws if either side is already part of a rename.
	 */
	public rename(sourceName: string, destName: string): this {
		if (this.renamedDestinations.has(destName)) {
			throw new MapperUsageError(
				`Destination field '${destName}' is already renamed. ` +
					`Each destination field can only be renamed once. ` +
					`Attempted duplicate rename from: ${sourceName}`
			);
		}
		if (Object.hasOwn(this.renames, sourceName)) {
			throw new MapperUsageError(
				`Source field '${sourceName}' is already renamed to '${this.renames[sourceName]}'. ` +
					`A rename table maps each source field once.`
			);
		}
		this.renamedDestinations.add(destName);
		this.renames[sourceName] = destName;
		return this;
	}

	/**
	 * Skip destination fields without reporting them as missing.
	 */
	public ignore(...destNames: string[]): this {
		this.ignored.push(...destNames);
		return this;
	}

	/**
	 * Register a custom mapper. Mappers run in registration order.
	 */
	public use(customMapper: CustomMapper): this {
		this.customMappers.push(customMapper);
		return this;
	}

	public logger(logger: Logger): this {
		this.options.logger = logger;
		return this;
	}

	public build(): StructMapper {
		return this.factory({
			...this.options,
			fieldRenames: { ...this.renames },
			ignoredDestinationFields: [...this.ignored],
			customMappers: [...this.customMappers]
		});
	}
}
