import z from "zod";
import { DecodeError } from "../lib/errors";
import {
	type LatencyReading,
	type LocationReading,
	type Monitor,
	type MonitorGroup,
	MonitorGroupSchema,
	type MonitorKind,
	type MonitorStatus,
	STATUS_CODES,
	type SupportedMonitorType,
	type Tag,
} from "../lib/types";

const STATUS_BY_CODE: ReadonlyMap<number, MonitorStatus> = new Map<
	number,
	MonitorStatus
>([
	[STATUS_CODES.down, "down"],
	[STATUS_CODES.up, "up"],
	[STATUS_CODES.trouble, "trouble"],
	[STATUS_CODES.critical, "critical"],
	[STATUS_CODES.suspended, "suspended"],
	[STATUS_CODES.maintenance, "maintenance"],
	[STATUS_CODES.discovery, "discovery"],
	[STATUS_CODES.configuration_error, "configuration_error"],
]);

/**
 * Maps a numeric Site24x7 status code to a status.
 *
 * @param code Status code from the payload.
 * @returns Status, `unknown` for codes this exporter does not know.
 */
export function statusFromCode(code: number): MonitorStatus {
	return STATUS_BY_CODE.get(code) ?? "unknown";
}

/**
 * Parses Site24x7 timestamps such as `2021-01-06T18:53:06+0000`.
 *
 * @param value Raw timestamp.
 * @returns Parsed date, or undefined when the value is not a timestamp.
 */
export function parseSite24x7Date(value: string): Date | undefined {
	const match =
		/^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?)(Z|[+-]\d{2}:?\d{2})$/.exec(
			value,
		);
	if (!match) return undefined;

	const [, local, zone] = match;
	const offset =
		zone === "Z" || zone === undefined
			? "Z"
			: `${zone.slice(0, 3)}:${zone.slice(-2)}`;
	const date = new Date(`${local}${offset}`);
	return Number.isNaN(date.getTime()) ? undefined : date;
}

const TimestampSchema = z
	.string()
	.nullish()
	.transform((value, ctx) => {
		if (value === null || value === undefined || value === "") return undefined;
		const date = parseSite24x7Date(value);
		if (date === undefined) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `Invalid timestamp '${value}'`,
			});
			return z.NEVER;
		}
		return date;
	});

// "-" stands for "no measurement possible"; anything non-numeric is treated the same way
const AttributeValueSchema = z
	.unknown()
	.transform((value): number | undefined => {
		if (typeof value === "number" && Number.isFinite(value)) return value;
		if (typeof value === "string" && /^\d+(\.\d+)?$/.test(value)) {
			return Number(value);
		}
		return undefined;
	});

const TagSchema = z.string().transform((raw): Tag => {
	const separator = raw.indexOf(":");
	return separator === -1
		? { key: raw, value: "" }
		: { key: raw.slice(0, separator), value: raw.slice(separator + 1) };
});

const RawLocationSchema = z
	.object({
		// Locations that have not polled yet omit their status
		status: z.number().int().default(STATUS_CODES.configuration_error),
		attribute_value: AttributeValueSchema,
		location_name: z.string(),
		last_polled_time: TimestampSchema,
	})
	.passthrough();

const RawMonitorSchema = z
	.object({
		monitor_id: z.string().min(1),
		name: z.string(),
		monitor_type: z.string(),
		status: z.number().int(),
		unit: z.string().nullish(),
		attributeName: z.string().nullish(),
		attribute_value: AttributeValueSchema,
		locations: z.array(RawLocationSchema).default([]),
		tags: z.array(TagSchema).default([]),
		last_polled_time: TimestampSchema,
	})
	.passthrough();

type RawMonitor = z.infer<typeof RawMonitorSchema>;

/**
 * Units per second for time-valued attributes.
 */
const UNITS_PER_SECOND: ReadonlyMap<string, number> = new Map([
	["ms", 1000],
	["s", 1],
	["sec", 1],
	["secs", 1],
]);

/**
 * Type-specific decode rule.
 */
type KindRule = {
	kind: MonitorKind;
	/** Units per second of the performance value; throws DecodeError for unsupported units. */
	scale(raw: RawMonitor): number;
};

function timeScale(raw: RawMonitor): number {
	const unit = raw.unit ?? "ms";
	const scale = UNITS_PER_SECOND.get(unit.toLowerCase());
	if (scale === undefined) {
		throw new DecodeError(
			`Unsupported unit '${unit}' for ${raw.monitor_type} monitor`,
			raw.monitor_id,
			"unit",
		);
	}
	return scale;
}

const KIND_RULES: Record<SupportedMonitorType, KindRule> = {
	URL: { kind: { type: "URL", attribute: "RESPONSETIME" }, scale: timeScale },
	HOMEPAGE: {
		kind: { type: "HOMEPAGE", attribute: "RESPONSETIME" },
		scale: timeScale,
	},
	RESTAPI: {
		kind: { type: "RESTAPI", attribute: "RESPONSETIME" },
		scale: timeScale,
	},
	REALBROWSER: {
		kind: { type: "REALBROWSER", attribute: "TRANSACTIONTIME" },
		scale: timeScale,
	},
};

function isSupportedType(type: string): type is SupportedMonitorType {
	return Object.hasOwn(KIND_RULES, type);
}

/**
 * Builds the latency reading for one status/value pair.
 *
 * @param status Decoded status.
 * @param value Raw attribute value.
 * @param scale Units per second, or undefined when the type has no performance value.
 * @returns Latency reading.
 */
function toLatency(
	status: MonitorStatus,
	value: number | undefined,
	scale: number | undefined,
): LatencyReading {
	if (scale === undefined) return { kind: "not_applicable" };
	if (status === "down") return { kind: "down" };
	if (value === undefined) return { kind: "unavailable" };
	return { kind: "measured", seconds: value / scale };
}

/**
 * Result of decoding one raw monitor.
 */
export type MonitorDecodeResult =
	| { ok: true; monitor: Monitor }
	| { ok: false; error: DecodeError; placeholder?: Monitor };

const PlaceholderSchema = z
	.object({
		monitor_id: z.string().min(1),
		name: z.string().catch(""),
		monitor_type: z.string().catch(""),
	})
	.passthrough();

/**
 * Reads what little can be trusted from a monitor that failed to decode.
 * Without a readable id there is nothing to attach the failure to.
 *
 * @param raw Raw monitor payload.
 * @returns Placeholder monitor with unknown status, or undefined.
 */
function placeholderFor(raw: unknown): Monitor | undefined {
	const parsed = PlaceholderSchema.safeParse(raw);
	if (!parsed.success) return undefined;

	const { monitor_id, name, monitor_type } = parsed.data;
	return {
		id: monitor_id,
		name: name === "" ? monitor_id : name,
		kind: isSupportedType(monitor_type)
			? KIND_RULES[monitor_type].kind
			: { type: "UNKNOWN", reportedType: monitor_type },
		status: "unknown",
		latency: { kind: "unavailable" },
		locations: [],
		tags: [],
	};
}

function monitorKeyOf(raw: unknown, index: number): string {
	if (typeof raw === "object" && raw !== null && "monitor_id" in raw) {
		const id = raw.monitor_id;
		if (typeof id === "string" && id !== "") return id;
	}
	return `#${index}`;
}

/**
 * Decodes one monitor from a `/current_status` payload.
 * Unknown fields are ignored; unknown monitor types decode to the `UNKNOWN` variant.
 *
 * @param raw Raw monitor payload.
 * @param index Position in its list, used as key when no id is readable.
 * @returns Decoded monitor, or the decode error plus a placeholder when the id is readable.
 */
export function decodeMonitor(raw: unknown, index: number): MonitorDecodeResult {
	const parsed = RawMonitorSchema.safeParse(raw);

	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const key = monitorKeyOf(raw, index);
		const error = new DecodeError(
			`Could not decode monitor ${key}: ${issue?.message ?? "invalid payload"}`,
			key,
			issue?.path.join(".") ?? "",
		);
		return { ok: false, error, placeholder: placeholderFor(raw) };
	}

	const data = parsed.data;
	const rule = isSupportedType(data.monitor_type)
		? KIND_RULES[data.monitor_type]
		: undefined;

	let scale: number | undefined;
	try {
		scale = rule?.scale(data);
	} catch (error) {
		if (!(error instanceof DecodeError)) throw error;
		return { ok: false, error, placeholder: placeholderFor(raw) };
	}

	const status = statusFromCode(data.status);
	const locations: LocationReading[] = data.locations.map((location) => {
		const locationStatus = statusFromCode(location.status);
		return {
			name: location.location_name,
			status: locationStatus,
			latency: toLatency(locationStatus, location.attribute_value, scale),
			...(location.last_polled_time && {
				lastPolledAt: location.last_polled_time,
			}),
		};
	});

	return {
		ok: true,
		monitor: {
			id: data.monitor_id,
			name: data.name,
			kind: rule?.kind ?? { type: "UNKNOWN", reportedType: data.monitor_type },
			status,
			latency: toLatency(status, data.attribute_value, scale),
			locations,
			tags: data.tags,
			...(data.last_polled_time && { lastPolledAt: data.last_polled_time }),
		},
	};
}

/**
 * Decodes a `/monitor_groups` entry.
 *
 * @param raw Raw group payload.
 * @param index Position in the list.
 * @returns Decoded group.
 * @throws {DecodeError} When the entry does not match the group schema.
 */
export function decodeMonitorGroup(raw: unknown, index: number): MonitorGroup {
	const parsed = MonitorGroupSchema.safeParse(raw);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		throw new DecodeError(
			`Could not decode monitor group #${index}: ${issue?.message ?? "invalid payload"}`,
			`#${index}`,
			issue?.path.join(".") ?? "",
		);
	}
	return {
		id: parsed.data.group_id,
		name: parsed.data.display_name,
		monitorIds: parsed.data.monitors,
	};
}
