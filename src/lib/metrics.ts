import z from "zod";

/**
 * Prometheus metric type discriminator.
 */
export type MetricType = z.infer<typeof MetricTypeSchema>;

/**
 * Zod schema validating Prometheus metric types (counter or gauge).
 */
export const MetricTypeSchema = z.union([
	z.literal("counter"),
	z.literal("gauge"),
]);

/**
 * Single metric observation with labels and numeric value.
 */
export type MetricValue = z.infer<typeof MetricValueSchema>;

/**
 * Zod schema validating metric observations with label key-value pairs and numeric values.
 * Values may be `+Inf` for monitors reported down.
 */
export const MetricValueSchema = z.object({
	labels: z.record(z.string(), z.string()),
	value: z.number(),
});

/**
 * Complete metric definition with metadata and observations for Prometheus export.
 */
export type MetricDefinition = z.infer<typeof MetricDefinitionSchema>;

/**
 * Zod schema validating complete metric definitions including name, help text, type, and observations.
 */
export const MetricDefinitionSchema = z.object({
	name: z.string().regex(/^[a-zA-Z_:][a-zA-Z0-9_:]*$/),
	help: z.string(),
	type: MetricTypeSchema,
	values: z.array(MetricValueSchema),
});

/**
 * Exported metric names. Renaming any of these breaks downstream dashboards.
 */
export const METRIC_NAMES = {
	MONITOR_UP: "site24x7_monitor_up",
	MONITOR_LATENCY: "site24x7_monitor_latency_seconds",
	MONITOR_VALUE_UNAVAILABLE: "site24x7_monitor_value_unavailable",
	MONITOR_LAST_POLLED: "site24x7_monitor_last_polled_timestamp_seconds",
	LOCATION_UP: "site24x7_monitor_location_up",
	LOCATION_LATENCY: "site24x7_monitor_location_latency_seconds",
	MONITORS: "site24x7_monitors",
	SCRAPE_ERROR: "site24x7_exporter_scrape_error",
	SCRAPE_ERRORS_TOTAL: "site24x7_exporter_scrape_errors_total",
	SCRAPE_DURATION: "site24x7_exporter_scrape_duration_seconds",
	LAST_SUCCESS: "site24x7_exporter_last_successful_scrape_timestamp_seconds",
} as const;
