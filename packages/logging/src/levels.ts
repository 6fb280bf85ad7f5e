/**
 * Logging level utilities.
 */
import type { LevelName, LevelNumber } from './types';

export type { LevelName, LevelNumber };

/**
 * Log level constants (Pino-compatible numbering)
 */
export const levels: Readonly<Record<LevelName, LevelNumber>> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40
};

const levelNames: Readonly<Record<LevelNumber, LevelName>> = {
	10: 'debug',
	20: 'info',
	30: 'warn',
	40: 'error'
};

export function getLevelName(level: LevelNumber): LevelName {
	return levelNames[level];
}

export function isLevelEnabled(current: LevelNumber, threshold: LevelNumber): boolean {
	return current >= threshold;
}

/**
 * Parse a level name from configuration text (case-insensitive).
 * Returns undefined for anything that is not a level.
 */
export function parseLevelName(value: string | undefined): LevelName | undefined {
	const normalized = value?.trim().toLowerCase();
	switch (normalized) {
		case 'debug':
		case 'info':
		case 'warn':
		case 'error':
			return normalized;
		default:
			return undefined;
	}
}
