/**
 * Error codes for categorization and alerting.
 */
export const ErrorCode = {
	// Upstream API
	AUTH_FAILED: "AUTH_FAILED",
	API_UNAVAILABLE: "API_UNAVAILABLE",
	API_TIMEOUT: "API_TIMEOUT",

	// Payload
	DECODE_ERROR: "DECODE_ERROR",

	// Config
	CONFIG_INVALID: "CONFIG_INVALID",

	// Unknown
	UNKNOWN: "UNKNOWN",
} as const;

/**
 * Error code type.
 */
export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Error context type.
 */
type ErrorContext = Record<string, unknown>;

/**
 * ExporterError options.
 */
type ExporterErrorOptions = ErrorOptions & {
	context?: ErrorContext;
	retryable?: boolean;
};

/**
 * Base error class with cause chaining, error codes, and structured logging support.
 */
export class ExporterError extends Error {
	readonly code: ErrorCode;
	readonly context: ErrorContext;
	readonly timestamp: string;
	readonly retryable: boolean;

	/**
	 * Create an ExporterError.
	 *
	 * @param message Error message.
	 * @param code Error code.
	 * @param options Error options.
	 */
	constructor(message: string, code: ErrorCode, options?: ExporterErrorOptions) {
		super(message, options);

		// Fix prototype chain for instanceof checks
		Object.setPrototypeOf(this, new.target.prototype);

		this.name = this.constructor.name;
		this.code = code;
		this.context = options?.context ?? {};
		this.timestamp = new Date().toISOString();
		this.retryable = options?.retryable ?? false;

		if (options?.cause instanceof Error) {
			this.stack = `${this.stack}\nCaused by: ${options.cause.stack}`;
		}
	}

	/**
	 * Convert to structured data for logging.
	 *
	 * @returns Structured error context.
	 */
	toStructuredData(): ErrorContext {
		return {
			error_code: this.code,
			error_message: this.message,
			error_name: this.name,
			error_retryable: this.retryable,
			...this.context,
		};
	}
}

/**
 * Rejected credentials, or an access token the API no longer accepts.
 */
export class AuthError extends ExporterError {
	readonly statusCode?: number;

	/**
	 * Create an AuthError.
	 *
	 * @param message Error message.
	 * @param options Error options.
	 */
	constructor(
		message: string,
		options?: ExporterErrorOptions & { statusCode?: number },
	) {
		super(message, ErrorCode.AUTH_FAILED, options);
		this.statusCode = options?.statusCode;
	}

	override toStructuredData(): ErrorContext {
		return {
			...super.toStructuredData(),
			...(this.statusCode !== undefined && { status_code: this.statusCode }),
		};
	}
}

/**
 * Network failure, timeout, or non-2xx response from the monitoring API.
 */
export class FetchError extends ExporterError {
	readonly statusCode?: number;

	/**
	 * Create a FetchError.
	 *
	 * @param message Error message.
	 * @param options Error options; `timedOut` selects the timeout code.
	 */
	constructor(
		message: string,
		options?: ExporterErrorOptions & { statusCode?: number; timedOut?: boolean },
	) {
		const statusCode = options?.statusCode;
		const code = options?.timedOut
			? ErrorCode.API_TIMEOUT
			: ErrorCode.API_UNAVAILABLE;
		const retryable =
			options?.timedOut === true ||
			statusCode === undefined ||
			statusCode === 429 ||
			statusCode >= 500;

		super(message, code, { ...options, retryable });
		this.statusCode = statusCode;
	}

	override toStructuredData(): ErrorContext {
		return {
			...super.toStructuredData(),
			...(this.statusCode !== undefined && { status_code: this.statusCode }),
		};
	}
}

/**
 * Payload of a single entity did not match its expected shape.
 */
export class DecodeError extends ExporterError {
	readonly monitorKey: string;
	readonly path: string;

	/**
	 * Create a DecodeError.
	 *
	 * @param message Error message.
	 * @param monitorKey Identifier of the offending entity (id, or index when no id is readable).
	 * @param path Dotted path to the first failing field.
	 * @param options Error options.
	 */
	constructor(
		message: string,
		monitorKey: string,
		path: string,
		options?: ExporterErrorOptions,
	) {
		super(message, ErrorCode.DECODE_ERROR, options);
		this.monitorKey = monitorKey;
		this.path = path;
	}

	override toStructuredData(): ErrorContext {
		return {
			...super.toStructuredData(),
			monitor_key: this.monitorKey,
			...(this.path !== "" && { path: this.path }),
		};
	}
}

/**
 * Configuration parsing/validation errors.
 */
export class ConfigError extends ExporterError {
	readonly issues?: Array<{ path: string; message: string }>;

	/**
	 * Create a ConfigError.
	 *
	 * @param message Error message.
	 * @param options Error options.
	 */
	constructor(
		message: string,
		options?: ExporterErrorOptions & {
			issues?: Array<{ path: string; message: string }>;
		},
	) {
		super(message, ErrorCode.CONFIG_INVALID, options);
		this.issues = options?.issues;
	}

	override toStructuredData(): ErrorContext {
		return {
			...super.toStructuredData(),
			...(this.issues && { validation_issues: this.issues }),
		};
	}
}

/**
 * Extract structured error info from any error type.
 *
 * @param error Error to extract info from.
 * @returns Structured error info.
 */
export function extractErrorInfo(error: unknown): {
	message: string;
	stack?: string;
	code: ErrorCode;
	context: ErrorContext;
	retryable: boolean;
} {
	if (error instanceof ExporterError) {
		return {
			message: error.message,
			stack: error.stack,
			code: error.code,
			context: error.context,
			retryable: error.retryable,
		};
	}

	if (error instanceof Error) {
		return {
			message: error.message,
			stack: error.stack,
			code: ErrorCode.UNKNOWN,
			context: {},
			retryable: false,
		};
	}

	return {
		message: String(error),
		code: ErrorCode.UNKNOWN,
		context: {},
		retryable: false,
	};
}
