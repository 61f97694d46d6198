import { describe, expect, it } from "vitest";
import { formatValue, serializeToPrometheus } from "./prometheus";

describe("serializeToPrometheus", () => {
	it("writes HELP and TYPE once per family followed by the samples", () => {
		const output = serializeToPrometheus([
			{
				name: "site24x7_monitor_up",
				help: "Monitor status",
				type: "gauge",
				values: [
					{ labels: { monitor_id: "1" }, value: 1 },
					{ labels: { monitor_id: "2" }, value: 0 },
				],
			},
			{
				name: "site24x7_exporter_scrape_error",
				help: "Scrape error",
				type: "gauge",
				values: [{ labels: {}, value: 0 }],
			},
		]);

		expect(output).toBe(
			[
				"# HELP site24x7_monitor_up Monitor status",
				"# TYPE site24x7_monitor_up gauge",
				'site24x7_monitor_up{monitor_id="1"} 1',
				'site24x7_monitor_up{monitor_id="2"} 0',
				"# HELP site24x7_exporter_scrape_error Scrape error",
				"# TYPE site24x7_exporter_scrape_error gauge",
				"site24x7_exporter_scrape_error 0",
				"",
			].join("\n"),
		);
	});

	it("returns an empty string without metrics", () => {
		expect(serializeToPrometheus([])).toBe("");
	});

	it("merges definitions sharing a name and keeps the last value per label set", () => {
		const output = serializeToPrometheus([
			{
				name: "a_total",
				help: "A",
				type: "counter",
				values: [
					{ labels: { code: "x" }, value: 1 },
					{ labels: { code: "y" }, value: 2 },
				],
			},
			{
				name: "a_total",
				help: "A",
				type: "counter",
				values: [{ labels: { code: "x" }, value: 5 }],
			},
		]);

		expect(output.split("\n")).toEqual([
			"# HELP a_total A",
			"# TYPE a_total counter",
			'a_total{code="x"} 5',
			'a_total{code="y"} 2',
			"",
		]);
	});

	it("escapes label values and help text", () => {
		const output = serializeToPrometheus([
			{
				name: "m",
				help: "line one\nback\\slash",
				type: "gauge",
				values: [{ labels: { name: 'a"b\\c\nd' }, value: 1 }],
			},
		]);

		expect(output.split("\n")).toEqual([
			"# HELP m line one\\nback\\\\slash",
			"# TYPE m gauge",
			'm{name="a\\"b\\\\c\\nd"} 1',
			"",
		]);
	});
});

describe("formatValue", () => {
	it("renders special values the way Prometheus parses them", () => {
		expect(formatValue(Number.POSITIVE_INFINITY)).toBe("+Inf");
		expect(formatValue(Number.NEGATIVE_INFINITY)).toBe("-Inf");
		expect(formatValue(Number.NaN)).toBe("NaN");
		expect(formatValue(0.12)).toBe("0.12");
	});
});
