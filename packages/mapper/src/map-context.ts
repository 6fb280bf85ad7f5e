/**
 * Per-call mapping state.
 *
 * A context is created for every map call and passed through each recursive
 * step, so a mapper shared between callers never holds scope or results.
 */

import { MissingSourceFieldError, type IncompatibleTypesError, type MapperError } from './mapper-error';
import { MapResult } from './map-result';
import type { MapperConfig } from './mapper-types';

export class MapContext {
	private readonly scope: string[] = [];

	/**
	 * @param probing - Probe contexts collect misses without ever throwing
	 */
	public constructor(
		public readonly config: MapperConfig,
		public readonly result: MapResult = new MapResult(),
		private readonly probing: boolean = false
	) {}

	/**
	 * Throwaway context for searching embedded records.
	 * Its misses are discarded by the caller.
	 */
	public probe(): MapContext {
		return new MapContext(this.config, new MapResult(), true);
	}

	public enter(fieldName: string): void {
		this.scope.push(fieldName);
	}

	public leave(): void {
		this.scope.pop();
	}

	/**
	 * Path to the current field, e.g. student.contact.phoneNumber
	 */
	public scopedFieldName(): string {
		return this.scope.join('.');
	}

	/**
	 * Record the current field as missing from the source.
	 *
	 * @throws MissingSourceFieldError when missing fields are fatal
	 */
	public reportMissing(): void {
		const path = this.scopedFieldName();
		this.result.addMissing(path);
		if (this.config.failOnMissingSourceField && !this.probing) {
			throw new MissingSourceFieldError([path]);
		}
	}

	/**
	 * Throw or record a failure according to the incompatible-types switch.
	 */
	public reportIncompatible(error: IncompatibleTypesError): void {
		if (this.config.failOnIncompatibleTypes) {
			throw error;
		}
		this.record(error);
	}

	public record(error: MapperError): void {
		this.config.logger.debug('Recorded mapping failure', {
			error: error.name,
			scope: this.scopedFieldName(),
			reason: error.message
		});
		this.result.addError(error);
	}
}
