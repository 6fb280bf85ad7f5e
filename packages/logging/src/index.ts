export { Logger, type LogObject, type Transport, type LoggerOptions, type LoggerGlobalOptions } from './logger';
export { levels, getLevelName, isLevelEnabled, parseLevelName, type LevelName, type LevelNumber } from './levels';
export { transports, consoleTransport, filterTransport } from './transports/index';
export type { ConsoleTransportOptions, FilterOptions } from './transports/index';
export {
	readLogConfig,
	buildLoggerOptions,
	createLoggerOptionsFromConfig,
	EnvConfigProvider,
	type ConfigProvider,
	type LogConfig
} from './config';
