import type { Logger } from "../lib/logger";
import { METRIC_NAMES, type MetricDefinition, type MetricValue } from "../lib/metrics";
import {
	type LatencyReading,
	type Monitor,
	type MonitorGroup,
	type MonitorStatus,
	STATUS_CODES,
} from "../lib/types";

/**
 * Value of the status metric for a monitor without a usable status this poll.
 */
export const UNAVAILABLE_STATUS_VALUE = -1;

type TrackedLocation = Readonly<{
	status: MonitorStatus;
	/** Seconds, `Infinity` when down, undefined when never measured. */
	latency: number | undefined;
}>;

type TrackedMonitor = Readonly<{
	id: string;
	name: string;
	type: string;
	group: string;
	status: MonitorStatus;
	latency: number | undefined;
	unavailable: boolean;
	lastPolledAt: Date | undefined;
	locations: ReadonlyMap<string, TrackedLocation>;
}>;

/**
 * Maps a status to the value of the `*_up` metrics.
 *
 * @param status Monitor or location status.
 * @returns Site24x7 status code, or -1 when unknown.
 */
export function statusValue(status: MonitorStatus): number {
	return status === "unknown" ? UNAVAILABLE_STATUS_VALUE : STATUS_CODES[status];
}

/**
 * Applies the value policy: down is `+Inf`, missing data keeps the previous value.
 *
 * @param reading Latency read in this poll.
 * @param previous Value exported before this poll.
 * @returns Value to export now.
 */
function nextLatency(
	reading: LatencyReading,
	previous: number | undefined,
): number | undefined {
	switch (reading.kind) {
		case "measured":
			return reading.seconds;
		case "down":
			return Number.POSITIVE_INFINITY;
		case "unavailable":
			return previous;
		case "not_applicable":
			return undefined;
	}
}

/**
 * Builds the `monitor_group` label for every grouped monitor.
 *
 * @param groups Groups from the latest fetch.
 * @returns Comma-joined sorted group names keyed by monitor id.
 */
function groupLabels(groups: readonly MonitorGroup[]): Map<string, string> {
	const names = new Map<string, Set<string>>();
	for (const group of groups) {
		for (const monitorId of group.monitorIds) {
			const set = names.get(monitorId) ?? new Set<string>();
			set.add(group.name);
			names.set(monitorId, set);
		}
	}

	const labels = new Map<string, string>();
	for (const [monitorId, set] of names) {
		labels.set(monitorId, [...set].sort().join(","));
	}
	return labels;
}

/**
 * Owns the exported monitor series.
 * Each update replaces the whole state, so readers never see half an update.
 */
export class MetricRegistry {
	private monitors: ReadonlyMap<string, TrackedMonitor> = new Map();
	private readonly logger: Logger;

	constructor(logger: Logger) {
		this.logger = logger.child("registry");
	}

	/**
	 * Number of monitors currently exported.
	 */
	get size(): number {
		return this.monitors.size;
	}

	/**
	 * Replaces the tracked state with the latest fetch.
	 * Monitors missing from `monitors` are retracted, even when the list is empty.
	 *
	 * @param monitors Every monitor from the latest fetch.
	 * @param groups Every group from the latest fetch.
	 * @returns The new snapshot.
	 */
	update(
		monitors: readonly Monitor[],
		groups: readonly MonitorGroup[],
	): MetricDefinition[] {
		const labels = groupLabels(groups);
		const next = new Map<string, TrackedMonitor>();

		for (const monitor of monitors) {
			const previous = this.monitors.get(monitor.id);
			next.set(
				monitor.id,
				this.track(monitor, previous, labels.get(monitor.id) ?? ""),
			);
		}

		const retracted = [...this.monitors.keys()].filter((id) => !next.has(id));
		if (monitors.length === 0 && this.monitors.size > 0) {
			// An empty listing is taken at face value
			this.logger.warn("API returned no monitors, retracting all series", {
				retracted: retracted.length,
			});
		} else if (retracted.length > 0) {
			this.logger.info("Retracting monitors no longer reported", {
				monitor_ids: retracted.join(","),
			});
		}

		this.monitors = next;
		return this.snapshot();
	}

	/**
	 * Builds the metric definitions for the current state.
	 *
	 * @returns Monitor metrics; families without series are left out.
	 */
	snapshot(): MetricDefinition[] {
		const up: MetricValue[] = [];
		const latency: MetricValue[] = [];
		const unavailable: MetricValue[] = [];
		const lastPolled: MetricValue[] = [];
		const locationUp: MetricValue[] = [];
		const locationLatency: MetricValue[] = [];

		for (const monitor of this.monitors.values()) {
			const labels = {
				monitor_id: monitor.id,
				monitor_name: monitor.name,
				monitor_type: monitor.type,
				monitor_group: monitor.group,
			};

			up.push({ labels, value: statusValue(monitor.status) });
			unavailable.push({ labels, value: monitor.unavailable ? 1 : 0 });
			if (monitor.latency !== undefined) {
				latency.push({ labels, value: monitor.latency });
			}
			if (monitor.lastPolledAt !== undefined) {
				lastPolled.push({
					labels,
					value: Math.floor(monitor.lastPolledAt.getTime() / 1000),
				});
			}

			for (const [location, tracked] of monitor.locations) {
				const locationLabels = { ...labels, location };
				locationUp.push({
					labels: locationLabels,
					value: statusValue(tracked.status),
				});
				if (tracked.latency !== undefined) {
					locationLatency.push({
						labels: locationLabels,
						value: tracked.latency,
					});
				}
			}
		}

		const definitions: MetricDefinition[] = [
			{
				name: METRIC_NAMES.MONITOR_UP,
				help: "Current status of the monitor (1 = up, 0 = down, other values are Site24x7 status codes, -1 = unavailable).",
				type: "gauge",
				values: up,
			},
			{
				name: METRIC_NAMES.MONITOR_LATENCY,
				help: "Last measured latency in seconds, +Inf while the monitor is down.",
				type: "gauge",
				values: latency,
			},
			{
				name: METRIC_NAMES.MONITOR_VALUE_UNAVAILABLE,
				help: "1 when the last poll returned no usable value and the previous value is shown.",
				type: "gauge",
				values: unavailable,
			},
			{
				name: METRIC_NAMES.MONITOR_LAST_POLLED,
				help: "Time Site24x7 last polled the monitor, in seconds since the epoch.",
				type: "gauge",
				values: lastPolled,
			},
			{
				name: METRIC_NAMES.LOCATION_UP,
				help: "Current status of the monitor per probe location (same values as site24x7_monitor_up).",
				type: "gauge",
				values: locationUp,
			},
			{
				name: METRIC_NAMES.LOCATION_LATENCY,
				help: "Last measured latency per probe location in seconds, +Inf while down.",
				type: "gauge",
				values: locationLatency,
			},
		];

		return definitions.filter((definition) => definition.values.length > 0);
	}

	/**
	 * Computes the tracked state of one monitor.
	 *
	 * @param monitor Monitor from the latest fetch.
	 * @param previous State before this update.
	 * @param group `monitor_group` label from the latest groups.
	 * @returns New state.
	 */
	private track(
		monitor: Monitor,
		previous: TrackedMonitor | undefined,
		group: string,
	): TrackedMonitor {
		if (monitor.status === "unknown" && previous !== undefined) {
			// Nothing trustworthy this poll: keep the last known values, flag them
			return { ...previous, group, status: "unknown", unavailable: true };
		}

		const locations = new Map<string, TrackedLocation>();
		for (const location of monitor.locations) {
			locations.set(location.name, {
				status: location.status,
				latency: nextLatency(
					location.latency,
					previous?.locations.get(location.name)?.latency,
				),
			});
		}

		return {
			id: monitor.id,
			name: monitor.name,
			type:
				monitor.kind.type === "UNKNOWN"
					? monitor.kind.reportedType
					: monitor.kind.type,
			group,
			status: monitor.status,
			latency: nextLatency(monitor.latency, previous?.latency),
			unavailable:
				monitor.status === "unknown" || monitor.latency.kind === "unavailable",
			lastPolledAt: monitor.lastPolledAt ?? previous?.lastPolledAt,
			locations,
		};
	}
}
