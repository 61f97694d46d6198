import type { MetricDefinition, MetricValue } from "./metrics";

/**
 * Content type of the text exposition format.
 */
export const PROMETHEUS_CONTENT_TYPE = "text/plain; version=0.0.4; charset=utf-8";

/**
 * Serializes MetricDefinition array to Prometheus text exposition format.
 * Groups metrics by name, outputs HELP/TYPE headers, then values.
 * A repeated label combination keeps its last value.
 *
 * @param metrics Array of metric definitions to serialize.
 * @returns Prometheus-formatted metrics string.
 */
export function serializeToPrometheus(
	metrics: readonly MetricDefinition[],
): string {
	// Group metrics by name to consolidate HELP/TYPE headers
	const grouped = new Map<string, MetricDefinition>();

	for (const metric of metrics) {
		const existing = grouped.get(metric.name);
		if (existing) {
			grouped.set(metric.name, {
				...existing,
				values: [...existing.values, ...metric.values],
			});
		} else {
			grouped.set(metric.name, { ...metric, values: [...metric.values] });
		}
	}

	const lines: string[] = [];

	for (const [name, metric] of grouped) {
		lines.push(`# HELP ${name} ${escapeHelp(metric.help)}`);
		lines.push(`# TYPE ${name} ${metric.type}`);

		for (const { labels, value } of dedupeByLabels(metric.values)) {
			lines.push(`${name}${formatLabels(labels)} ${formatValue(value)}`);
		}
	}

	return lines.length === 0 ? "" : `${lines.join("\n")}\n`;
}

/**
 * Collapses values with identical labels, last one wins, first position kept.
 *
 * @param values Array of metric values.
 * @returns Deduplicated array of metric values.
 */
function dedupeByLabels(values: readonly MetricValue[]): MetricValue[] {
	const bySignature = new Map<string, MetricValue>();
	for (const value of values) {
		bySignature.set(labelSignature(value.labels), value);
	}
	return [...bySignature.values()];
}

/**
 * Creates stable signature from labels for deduplication.
 *
 * @param labels Label key-value pairs.
 * @returns Stable string signature for comparison.
 */
function labelSignature(labels: Record<string, string>): string {
	return Object.entries(labels)
		.sort(([a], [b]) => a.localeCompare(b))
		.map(([k, v]) => `${k}\x00${v}`)
		.join("\x01");
}

/**
 * Formats labels object into Prometheus label string.
 *
 * @param labels Label key-value pairs.
 * @returns Formatted label string like `{key="value"}` or empty string.
 */
function formatLabels(labels: Record<string, string>): string {
	const entries = Object.entries(labels);
	if (entries.length === 0) return "";

	const formatted = entries
		.map(([key, value]) => `${key}="${escapeLabel(value)}"`)
		.join(",");

	return `{${formatted}}`;
}

/**
 * Formats numeric value for Prometheus output.
 *
 * @param value Numeric value to format.
 * @returns String representation handling NaN and Infinity.
 */
export function formatValue(value: number): string {
	if (Number.isNaN(value)) return "NaN";
	if (!Number.isFinite(value)) return value > 0 ? "+Inf" : "-Inf";
	return String(value);
}

function escapeHelp(help: string): string {
	return help.replace(/\\/g, "\\\\").replace(/\n/g, "\\n");
}

function escapeLabel(value: string): string {
	return value
		.replace(/\\/g, "\\\\")
		.replace(/"/g, '\\"')
		.replace(/\n/g, "\\n");
}
