import { parseLevelName } from './levels';
import { consoleTransport } from './transports/console';
import { filterTransport } from './transports/filter';
import type { LevelName, LoggerOptions, Transport } from './types';

/**
 * Minimal ConfigProvider interface for logging configuration.
 * Any key-value source (environment, secrets store, test double) fits.
 */
export interface ConfigProvider {
	get(key: string): Promise<string | undefined>;
}

/**
 * Configuration provider that reads from process.env.
 *
 * @example
 * ```ts
 * const loggerOptions = await createLoggerOptionsFromConfig(new EnvConfigProvider());
 * Logger.configure(loggerOptions);
 * ```
 */
export class EnvConfigProvider implements ConfigProvider {
	constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

	async get(key: string): Promise<string | undefined> {
		return this.env[key];
	}
}

/**
 * Logging configuration read from config provider.
 */
export interface LogConfig {
	/** Log level threshold (debug, info, warn, error). Default: 'info' */
	level: LevelName;
	/** Logger names to include (empty = all) */
	includeNames: string[];
	/** Logger names to exclude */
	excludeNames: string[];
	/** Use JSON format (production) vs pretty format (dev) */
	jsonFormat: boolean;
}

const DEFAULT_LEVEL: LevelName = 'info';

/**
 * Parse comma-separated string into array, filtering empty values.
 */
function parseList(value: string | undefined): string[] {
	if (!value || value.trim() === '') return [];
	return value
		.split(',')
		.map((s) => s.trim())
		.filter(Boolean);
}

/**
 * Read logging configuration from a config provider.
 *
 * Reads these keys:
 * - LOG_LEVEL: debug | info | warn | error (default: info)
 * - LOG_INCLUDE_NAMES: comma-separated logger names to include
 * - LOG_EXCLUDE_NAMES: comma-separated logger names to exclude
 * - LOG_JSON: true | false (default: false)
 */
export async function readLogConfig(config: ConfigProvider): Promise<LogConfig> {
	const level = await config.get('LOG_LEVEL');
	const includeNames = await config.get('LOG_INCLUDE_NAMES');
	const excludeNames = await config.get('LOG_EXCLUDE_NAMES');
	const jsonFormat = await config.get('LOG_JSON');

	return {
		level: parseLevelName(level) ?? DEFAULT_LEVEL,
		includeNames: parseList(includeNames),
		excludeNames: parseList(excludeNames),
		jsonFormat: jsonFormat === 'true'
	};
}

/**
 * Build logger options from a LogConfig.
 *
 * @example
 * ```ts
 * const logConfig = await readLogConfig(config);
 * Logger.configure(buildLoggerOptions(logConfig));
 * ```
 */
export function buildLoggerOptions(config: LogConfig): LoggerOptions {
	let transport: Transport = consoleTransport({
		json: config.jsonFormat,
		pretty: !config.jsonFormat
	});

	// Apply name filtering if configured
	if (config.includeNames.length > 0 || config.excludeNames.length > 0) {
		transport = filterTransport(transport, {
			includeNames: config.includeNames,
			excludeNames: config.excludeNames
		});
	}

	return {
		level: config.level,
		transports: [transport]
	};
}

/**
 * Convenience function to create logger options directly from config provider.
 */
export async function createLoggerOptionsFromConfig(config: ConfigProvider): Promise<LoggerOptions> {
	const logConfig = await readLogConfig(config);
	return buildLoggerOptions(logConfig);
}
