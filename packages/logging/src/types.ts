/**
 * Logging type definitions.
 */

/**
 * Log level names (Pino-compatible)
 */
export type LevelName = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log level numeric values (Pino-compatible numbering)
 */
export type LevelNumber = 10 | 20 | 30 | 40;

/**
 * Structured log object produced by the logger (Pino-compatible)
 */
export interface LogObject {
	time: number;
	level: LevelNumber;
	msg: string;
	name?: string;
	[key: string]: unknown;
}

/**
 * Transport interface for log output destinations.
 *
 * Logger.shutdown() awaits flush() and close() on the global transports.
 */
export interface Transport {
	/** Write a log object to the transport */
	write(obj: LogObject): void;
	/** Flush any buffered logs */
	flush(): Promise<void>;
	/** Release resources held by the transport */
	close(): Promise<void>;
}

/**
 * Options for creating a Logger instance
 */
export interface LoggerOptions {
	level?: LevelName;
	transports?: Transport[];
}

/**
 * Global defaults applied by Logger.configure()
 */
export interface LoggerGlobalOptions {
	level?: LevelName;
	transports?: Transport[];
}
