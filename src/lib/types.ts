import z from "zod";

/**
 * Site24x7 status codes as sent in `status` fields.
 */
export const STATUS_CODES = {
	down: 0,
	up: 1,
	trouble: 2,
	critical: 3,
	suspended: 5,
	maintenance: 7,
	discovery: 9,
	configuration_error: 10,
} as const;

/**
 * Status reported by the API; `unknown` covers unrecognized codes and unreadable payloads.
 */
export type MonitorStatus = keyof typeof STATUS_CODES | "unknown";

/**
 * Monitor types with a type-specific performance reading.
 */
export const SUPPORTED_MONITOR_TYPES = [
	"URL",
	"HOMEPAGE",
	"RESTAPI",
	"REALBROWSER",
] as const;

export type SupportedMonitorType = (typeof SUPPORTED_MONITOR_TYPES)[number];

/**
 * Tagged variant over monitor types. `UNKNOWN` keeps the type string the API sent.
 */
export type MonitorKind =
	| {
			readonly type: "URL" | "HOMEPAGE" | "RESTAPI";
			readonly attribute: "RESPONSETIME";
	  }
	| { readonly type: "REALBROWSER"; readonly attribute: "TRANSACTIONTIME" }
	| { readonly type: "UNKNOWN"; readonly reportedType: string };

/**
 * Performance reading of one poll.
 * `down` is only produced by an explicit down status; missing data is `unavailable`.
 * Monitor types without a performance value read `not_applicable`.
 */
export type LatencyReading =
	| { readonly kind: "measured"; readonly seconds: number }
	| { readonly kind: "down" }
	| { readonly kind: "unavailable" }
	| { readonly kind: "not_applicable" };

/**
 * Per-probe-location status of a monitor.
 */
export type LocationReading = Readonly<{
	name: string;
	status: MonitorStatus;
	latency: LatencyReading;
	lastPolledAt?: Date;
}>;

/**
 * User-defined monitor tag (`key:value`, value may be empty).
 */
export type Tag = Readonly<{ key: string; value: string }>;

/**
 * Decoded monitor.
 */
export type Monitor = Readonly<{
	id: string;
	name: string;
	kind: MonitorKind;
	status: MonitorStatus;
	latency: LatencyReading;
	locations: readonly LocationReading[];
	tags: readonly Tag[];
	lastPolledAt?: Date;
}>;

/**
 * Monitor group with the ids of its member monitors.
 */
export type MonitorGroup = Readonly<{
	id: string;
	name: string;
	monitorIds: readonly string[];
}>;

/**
 * Short-lived OAuth access token.
 */
export type AccessToken = Readonly<{
	value: string;
	/** Epoch milliseconds. */
	expiresAt: number;
}>;

/**
 * Zod schema for the Zoho token endpoint response.
 */
export const AccessTokenResponseSchema = z.union([
	z.object({
		access_token: z.string().min(1),
		expires_in: z.number().positive(),
		api_domain: z.string().optional(),
		token_type: z.string().optional(),
	}),
	z.object({ error: z.string() }),
]);

/**
 * Zod schema for pagination info attached to Site24x7 list responses.
 */
export const PageInfoSchema = z
	.object({
		more_records: z.boolean().optional(),
		page: z.number().optional(),
	})
	.passthrough();

/**
 * Zod schema for the common Site24x7 response envelope.
 * `data` is validated per endpoint.
 */
export const EnvelopeSchema = z.union([
	z.object({
		error_code: z.number(),
		message: z.string(),
	}),
	z.object({
		code: z.number(),
		message: z.string().optional(),
		data: z.unknown(),
		info: PageInfoSchema.optional(),
	}),
]);

/**
 * Zod schema for `/current_status` data. Monitors stay raw so each one decodes on its own.
 */
export const CurrentStatusDataSchema = z
	.object({
		monitors: z.array(z.unknown()).default([]),
		monitor_groups: z
			.array(
				z
					.object({
						group_id: z.string().optional(),
						group_name: z.string().optional(),
						monitors: z.array(z.unknown()).default([]),
					})
					.passthrough(),
			)
			.default([]),
	})
	.passthrough();

/**
 * Zod schema for an entry of `/monitor_groups`.
 */
export const MonitorGroupSchema = z
	.object({
		group_id: z.string(),
		display_name: z.string(),
		monitors: z.array(z.string()).default([]),
	})
	.passthrough()
	.readonly();

export const MonitorGroupListSchema = z.array(z.unknown());
