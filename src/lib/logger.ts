import { createConsola, type LogObject } from "consola";

// Raw ANSI escape codes so pretty output looks the same under tsx, pm2 and docker logs
const ansi = {
	reset: "\x1b[0m",
	dim: "\x1b[2m",
	red: "\x1b[31m",
	yellow: "\x1b[33m",
	cyan: "\x1b[36m",
	white: "\x1b[37m",
	gray: "\x1b[90m",
};

const c = {
	dim: (s: string) => `${ansi.dim}${s}${ansi.reset}`,
	red: (s: string) => `${ansi.red}${s}${ansi.reset}`,
	yellow: (s: string) => `${ansi.yellow}${s}${ansi.reset}`,
	cyan: (s: string) => `${ansi.cyan}${s}${ansi.reset}`,
	white: (s: string) => `${ansi.white}${s}${ansi.reset}`,
	gray: (s: string) => `${ansi.gray}${s}${ansi.reset}`,
};

/**
 * Log severity levels.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Output format: json for structured logs, pretty for human-readable.
 */
export type LogFormat = "json" | "pretty";

/**
 * Key-value pairs attached to log entries.
 */
export type StructuredData = Record<string, unknown>;

/**
 * Structured logger with level methods, namespacing, and context.
 */
export interface Logger {
	debug(msg: string, data?: StructuredData): void;
	info(msg: string, data?: StructuredData): void;
	warn(msg: string, data?: StructuredData): void;
	error(msg: string, data?: StructuredData): void;

	/**
	 * Create child logger with namespaced tag.
	 *
	 * @param namespace Namespace appended to parent tag with colon separator.
	 * @returns New logger instance.
	 */
	child(namespace: string): Logger;

	/**
	 * Create logger with merged context data.
	 *
	 * @param ctx Context data merged into all log entries.
	 * @returns New logger instance.
	 */
	withContext(ctx: StructuredData): Logger;
}

/**
 * Logger configuration.
 */
export interface LoggerConfig {
	/** Output format, defaults to pretty. */
	format?: LogFormat;

	/** Minimum log level, defaults to info. */
	level?: LogLevel;
}

const LEVELS: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

const LEVEL_COLORS: Record<LogLevel, (s: string) => string> = {
	debug: c.gray,
	info: c.cyan,
	warn: c.yellow,
	error: c.red,
};

const LEVEL_ICONS: Record<LogLevel, string> = {
	debug: "●",
	info: "◆",
	warn: "▲",
	error: "✖",
};

/**
 * Narrow a consola log type to one of our levels.
 *
 * @param type Consola log type.
 * @returns True if the type is a supported level.
 */
function isLogLevel(type: string): type is LogLevel {
	return type in LEVELS;
}

function isStructuredData(value: unknown): value is StructuredData {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Split consola arguments back into message and structured data.
 *
 * @param args Raw consola arguments.
 * @returns Message text and optional data.
 */
function splitArgs(args: unknown[]): { msg: string; data?: StructuredData } {
	const [first, second] = args;
	return {
		msg: typeof first === "string" ? first : String(first),
		data: isStructuredData(second) ? second : undefined,
	};
}

/**
 * Format current time as HH:MM:SS.
 *
 * @returns Formatted time string.
 */
function formatTime(): string {
	const now = new Date();
	return `${String(now.getHours()).padStart(2, "0")}:${String(now.getMinutes()).padStart(2, "0")}:${String(now.getSeconds()).padStart(2, "0")}`;
}

function formatValue(v: unknown): string {
	if (typeof v === "string") return v;
	if (typeof v === "number" || typeof v === "boolean") return String(v);
	return JSON.stringify(v);
}

/**
 * Format structured data as key=value pairs.
 *
 * @param data Structured data object.
 * @returns Formatted string with colored key-value pairs.
 */
function formatData(data: StructuredData): string {
	return Object.entries(data)
		.map(([k, v]) => `${c.dim(k)}=${c.white(formatValue(v))}`)
		.join(" ");
}

/**
 * Create pretty console reporter for human-readable logs.
 *
 * @param minLevel Minimum log level to output.
 * @returns Reporter object with log method.
 */
function createPrettyReporter(minLevel: LogLevel) {
	const minLevelNum = LEVELS[minLevel];

	return {
		log(logObj: LogObject) {
			const level = logObj.type;
			if (!isLogLevel(level) || LEVELS[level] < minLevelNum) return;

			const tag = logObj.tag || "app";
			const { msg, data } = splitArgs(logObj.args);

			const time = c.dim(formatTime());
			const levelBadge = LEVEL_COLORS[level](
				`${LEVEL_ICONS[level]} ${level.toUpperCase().padEnd(5)}`,
			);
			const suffix = data ? ` ${formatData(data)}` : "";

			console.log(`${time} ${levelBadge} ${c.dim(tag)} ${msg}${suffix}`);
		},
	};
}

/**
 * Create JSON reporter for structured logs.
 *
 * @param minLevel Minimum log level to output.
 * @returns Reporter object with log method.
 */
function createJsonReporter(minLevel: LogLevel) {
	const minLevelNum = LEVELS[minLevel];

	return {
		log(logObj: LogObject) {
			const level = logObj.type;
			if (!isLogLevel(level) || LEVELS[level] < minLevelNum) return;

			const [logger, ...namespaceParts] = (logObj.tag || "app").split(":");
			const namespace =
				namespaceParts.length > 0 ? namespaceParts.join(":") : undefined;
			const { msg, data } = splitArgs(logObj.args);

			console.log(
				JSON.stringify({
					ts: new Date().toISOString(),
					logger,
					...(namespace && { namespace }),
					level,
					msg,
					...data,
				}),
			);
		},
	};
}

// Consola log levels: 0=silent, 1=error, 2=warn, 3=info, 4=debug, 5=trace
const CONSOLA_LEVELS: Record<LogLevel, number> = {
	error: 1,
	warn: 2,
	info: 3,
	debug: 4,
};

/**
 * Create logger instance with specified name and config.
 *
 * @param name Logger name, normalized to lowercase with underscores.
 * @param config Logger configuration.
 * @returns Configured logger instance.
 */
export function createLogger(name: string, config: LoggerConfig = {}): Logger {
	const format = config.format ?? "pretty";
	const level = config.level ?? "info";

	const reporter =
		format === "json" ? createJsonReporter(level) : createPrettyReporter(level);

	const consola = createConsola({
		level: CONSOLA_LEVELS[level],
		reporters: [reporter],
	});

	function makeLogger(tag: string, baseContext: StructuredData = {}): Logger {
		const instance = consola.withTag(tag);

		const mergeData = (data?: StructuredData): StructuredData | undefined => {
			if (!data && Object.keys(baseContext).length === 0) return undefined;
			if (!data) return baseContext;
			return { ...baseContext, ...data };
		};

		return {
			debug: (msg, data) => instance.debug(msg, mergeData(data)),
			info: (msg, data) => instance.info(msg, mergeData(data)),
			warn: (msg, data) => instance.warn(msg, mergeData(data)),
			error: (msg, data) => instance.error(msg, mergeData(data)),
			child: (ns) => makeLogger(`${tag}:${ns}`, baseContext),
			withContext: (ctx) => makeLogger(tag, { ...baseContext, ...ctx }),
		};
	}

	const normalizedName = name.toLowerCase().replace(/[ -]/g, "_");
	return makeLogger(normalizedName);
}
