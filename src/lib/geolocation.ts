import { readFileSync } from "node:fs";
import z from "zod";

/**
 * Zod schema for one Site24x7 probe location.
 */
export const GeolocationSchema = z.object({
	key: z.string().min(1),
	name: z.string().min(1),
	latitude: z.number().min(-90).max(90),
	longitude: z.number().min(-180).max(180),
});

export type Geolocation = z.infer<typeof GeolocationSchema>;

const GEOLOCATIONS_URL = new URL("../data/geolocations.json", import.meta.url);

let cached: readonly Geolocation[] | undefined;

/**
 * Probe locations with coordinates, for map panels keyed by the `location` label.
 * Read once from the bundled data file.
 *
 * @returns Probe locations.
 */
export function loadGeolocations(): readonly Geolocation[] {
	if (cached === undefined) {
		const raw: unknown = JSON.parse(readFileSync(GEOLOCATIONS_URL, "utf8"));
		cached = z.array(GeolocationSchema).parse(raw);
	}
	return cached;
}
