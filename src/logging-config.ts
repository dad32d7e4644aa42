import { Writable } from 'node:stream';

export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warning: 30,
	error: 40,
};

const isLogLevel = (value: string | undefined): value is LogLevel =>
	value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);

const levelFromEnv = (): LogLevel | undefined => {
	const raw = process.env.STRUCTURA_LOGGING_LEVEL?.toLowerCase();
	if (raw === 'warn') {
		return 'warning';
	}
	return isLogLevel(raw) ? raw : undefined;
};

interface SetupLoggingOptions {
	stream?: Writable;
	logLevel?: LogLevel;
	forceSetup?: boolean;
}

let configured = false;
let globalLevel: LogLevel = levelFromEnv() ?? 'info';
let outputStream: Writable = process.stderr;

const formatMessage = (level: LogLevel, name: string, message: string) => {
	const paddedLevel = level.toUpperCase().padEnd(7, ' ');
	return `${paddedLevel} [${name}] ${message}`;
};

const formatArg = (arg: unknown): string => {
	if (typeof arg === 'string') {
		return arg;
	}
	if (arg instanceof Error) {
		return `${arg.name}: ${arg.message}`;
	}
	return JSON.stringify(arg);
};

export class Logger {
	constructor(private readonly name: string) {}

	private shouldLog(level: LogLevel) {
		return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[globalLevel];
	}

	private emit(level: LogLevel, message: string, ...args: unknown[]) {
		if (!this.shouldLog(level)) {
			return;
		}

		const formatted = formatMessage(level, this.name, message);
		const payload = args.length ? `${formatted} ${args.map(formatArg).join(' ')}` : formatted;
		outputStream.write(`${payload}\n`);
	}

	debug(message: string, ...args: unknown[]) {
		this.emit('debug', message, ...args);
	}

	info(message: string, ...args: unknown[]) {
		this.emit('info', message, ...args);
	}

	warning(message: string, ...args: unknown[]) {
		this.emit('warning', message, ...args);
	}

	error(message: string, ...args: unknown[]) {
		this.emit('error', message, ...args);
	}
}

export const createLogger = (name: string) => new Logger(name);

export const setupLogging = (options: SetupLoggingOptions = {}) => {
	if (configured && !options.forceSetup) {
		return createLogger('structura');
	}

	globalLevel = options.logLevel ?? levelFromEnv() ?? 'info';
	outputStream = options.stream ?? process.stderr;
	configured = true;

	return createLogger('structura');
};
