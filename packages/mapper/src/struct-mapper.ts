/**
 * Structural Mapper Implementation
 *
 * Runtime mapping between two shaped values.
 */

import { MapContext } from './map-context';
import { MapResult } from './map-result';
import { MissingSourceFieldError } from './mapper-error';
import { describeShape } from './shape';
import { mapValues } from './traversal';
import { destinationSlot, typed } from './typed';
import type { MappedValue, MapperConfig, Typed } from './mapper-types';
import type { RecordFieldsInput, RecordType, RecordValue } from './types';

/**
 * Mapper bound to one frozen configuration.
 * Holds no per-call state, so one instance can serve any number of calls.
 */
export class StructMapper {
	public constructor(public readonly config: MapperConfig) {}

	/**
	 * Copy matching fields from source into dest.
	 *
	 * The destination must be a mutable reference: a record object, updated in
	 * place, or a Ref. Fatal failures throw; the rest are collected in the result.
	 *
	 * @example
	 * ```typescript
	 * const dto = PersonDto.zero();
	 * const result = mapper.map(typed(Person, person), typed(PersonDto, dto));
	 * if (!result.ok) log.warn('Partial mapping', { reason: result.error()?.message });
	 * ```
	 */
	public map(source: Typed, dest: Typed): MapResult {
		const slot = destinationSlot(dest);
		const ctx = new MapContext(this.config);

		mapValues(ctx, source.value, source.shape, slot, dest.shape);

		const { result } = ctx;
		if (result.missingSourceFields.length > 0) {
			ctx.record(new MissingSourceFieldError(result.missingSourceFields));
		}

		if (this.config.logger.isLevelEnabled('debug')) {
			this.config.logger.debug('Mapped value', {
				source: describeShape(source.shape),
				dest: describeShape(dest.shape),
				errors: result.errors.length,
				missing: result.missingSourceFields.length
			});
		}
		return result;
	}

	/**
	 * Map into a fresh zero instance of a record type.
	 */
	public create<F extends RecordFieldsInput>(
		source: Typed,
		type: RecordType<F>
	): MappedValue<RecordValue<F>, MapResult> {
		const value = type.zero();
		const result = this.map(source, typed(type, value));
		return { value, result };
	}
}
