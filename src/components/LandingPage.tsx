import { raw } from "hono/html";
import type { FC } from "hono/jsx";
import type { AppConfig } from "../lib/config";

type Props = {
	config: Pick<AppConfig, "endpoint" | "metricsPath" | "geolocationPath">;
};

export const LandingPage: FC<Props> = ({ config }) => {
	return (
		<html lang="en">
			<head>
				<meta charset="UTF-8" />
				<meta name="viewport" content="width=device-width, initial-scale=1.0" />
				<title>Site24x7 Exporter</title>
				<style>
					{raw`body {
						font-family: system-ui, sans-serif;
						max-width: 40rem;
						margin: 3rem auto;
						padding: 0 1rem;
						color: #1f2937;
					}
					h1 { font-size: 1.5rem; margin-bottom: 0.25rem; }
					.muted { color: #6b7280; font-size: 0.875rem; }
					ul { padding-left: 1.25rem; line-height: 1.8; }
					code { background: #f3f4f6; padding: 0 0.25rem; border-radius: 0.25rem; }`}
				</style>
			</head>
			<body>
				<h1>Site24x7 Exporter</h1>
				<p class="muted">
					Data center <code>{config.endpoint}</code>
				</p>
				<ul>
					<li>
						<a href={config.metricsPath}>{config.metricsPath}</a>: Prometheus
						metrics
					</li>
					<li>
						<a href={config.geolocationPath}>{config.geolocationPath}</a>: probe
						location coordinates
					</li>
					<li>
						<a href="/health">/health</a>: result of the last scrape
					</li>
				</ul>
			</body>
		</html>
	);
};
