/**
 * Outcome of one map call, owned by the caller once map returns.
 */

import { MapperError } from './mapper-error';

/**
 * Fold messages into one sentence: "a", "a and b", "a, b, and c".
 */
export function joinErrorMessages(messages: readonly string[]): string {
	if (messages.length <= 1) {
		return messages[0] ?? '';
	}
	if (messages.length === 2) {
		return `${messages[0]} and ${messages[1]}`;
	}
	return `${messages.slice(0, -1).join(', ')}, and ${messages[messages.length - 1]}`;
}

export class MapResult {
	private readonly missing: string[] = [];
	private readonly recorded: MapperError[] = [];

	/** Dotted scope paths of destination fields with no source counterpart */
	public get missingSourceFields(): readonly string[] {
		return this.missing;
	}

	/** Non-fatal failures in the order they were encountered */
	public get errors(): readonly MapperError[] {
		return this.recorded;
	}

	public get ok(): boolean {
		return this.recorded.length === 0;
	}

	/**
	 * All recorded failures as one error, or undefined when there are none.
	 * A single failure is returned as-is.
	 */
	public error(): MapperError | undefined {
		if (this.recorded.length <= 1) {
			return this.recorded[0];
		}
		return new MapperError(joinErrorMessages(this.recorded.map((error) => error.message)));
	}

	/** @internal */
	public addMissing(path: string): void {
		this.missing.push(path);
	}

	/** @internal */
	public addError(error: MapperError): void {
		this.recorded.push(error);
	}
}
