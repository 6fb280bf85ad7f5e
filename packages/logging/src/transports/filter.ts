import { levels } from '../levels';
import type { Transport, LogObject, LevelName } from '../types';

export interface FilterOptions {
	/** Only log these names (empty = all) */
	includeNames?: string[];
	/** Never log these names */
	excludeNames?: string[];
	/** Drop entries below this level */
	minLevel?: LevelName;
}

/**
 * Filter transport - wraps another transport and filters by logger name and level.
 *
 * @example
 * ```ts
 * // Only mapping diagnostics, warnings and above
 * filterTransport(consoleTransport(), {
 *   includeNames: ['Mapper'],
 *   minLevel: 'warn'
 * })
 * ```
 */
export function filterTransport(transport: Transport, options: FilterOptions): Transport {
	const includeSet = options.includeNames?.length ? new Set(options.includeNames) : null;
	const excludeSet = options.excludeNames?.length ? new Set(options.excludeNames) : null;
	const minLevel = options.minLevel ? levels[options.minLevel] : null;

	function shouldLog(obj: LogObject): boolean {
		if (minLevel !== null && obj.level < minLevel) {
			return false;
		}
		if (!obj.name) return true;
		if (includeSet && !includeSet.has(obj.name)) {
			return false;
		}
		return !excludeSet?.has(obj.name);
	}

	return {
		write(obj: LogObject): void {
			if (shouldLog(obj)) {
				transport.write(obj);
			}
		},

		async flush(): Promise<void> {
			await transport.flush();
		},

		async close(): Promise<void> {
			await transport.close();
		}
	};
}
