/**
 * Current weather from the Open-Meteo forecast API, fetched in the
 * background every `refreshMinutes`. Temperatures are kept in °C and
 * converted for display.
 */

import type { BarConfig, ModuleActionContext, TemperatureUnit, WeatherOptions } from "@stripbar/core";
import { type ModuleDeps, PolledModule } from "./polledModule.js";

export type WeatherCondition =
  | "clear"
  | "partlyCloudy"
  | "cloudy"
  | "overcast"
  | "rain"
  | "heavyRain"
  | "thunderstorm"
  | "snow"
  | "fog"
  | "windy"
  | "unknown";

export type WeatherReport = Readonly<{
  location: string;
  condition: WeatherCondition;
  description: string;
  temperatureC: number;
  feelsLikeC: number;
  humidity: number;
  highC: number;
  lowC: number;
}>;

export type WeatherQuery = Readonly<{ latitude: number; longitude: number; locationName: string }>;
export type WeatherFetcher = (query: WeatherQuery) => Promise<WeatherReport>;

const FORECAST_URL = "https://api.open-meteo.com/v1/forecast";
const WEATHER_SITE_URL = "https://weather.com";

const ICONS: Readonly<Record<WeatherCondition, string>> = {
  clear: "☀️",
  partlyCloudy: "⛅",
  cloudy: "☁️",
  overcast: "☁️",
  rain: "🌧️",
  heavyRain: "🌧️",
  thunderstorm: "⛈️",
  snow: "❄️",
  fog: "🌫️",
  windy: "💨",
  unknown: "🌡️",
};

/** WMO weather interpretation code → condition and description. */
export function describeWmoCode(code: number): Readonly<{ condition: WeatherCondition; description: string }> {
  if (code === 0) return { condition: "clear", description: "Clear sky" };
  if (code === 1 || code === 2) return { condition: "partlyCloudy", description: "Partly cloudy" };
  if (code === 3) return { condition: "overcast", description: "Overcast" };
  if (code === 45 || code === 48) return { condition: "fog", description: "Fog" };
  if (code >= 51 && code <= 57) return { condition: "rain", description: "Drizzle" };
  if (code === 65 || code === 82) return { condition: "heavyRain", description: "Heavy rain" };
  if ((code >= 61 && code <= 67) || code === 80 || code === 81) return { condition: "rain", description: "Rain" };
  if ((code >= 71 && code <= 77) || code === 85 || code === 86) return { condition: "snow", description: "Snow" };
  if (code >= 95 && code <= 99) return { condition: "thunderstorm", description: "Thunderstorm" };
  return { condition: "unknown", description: "Unknown" };
}

export function forecastUrl(query: WeatherQuery): string {
  const url = new URL(FORECAST_URL);
  url.searchParams.set("latitude", String(query.latitude));
  url.searchParams.set("longitude", String(query.longitude));
  url.searchParams.set("current", "temperature_2m,apparent_temperature,relative_humidity_2m,weather_code");
  url.searchParams.set("daily", "temperature_2m_max,temperature_2m_min");
  url.searchParams.set("timezone", "auto");
  url.searchParams.set("forecast_days", "1");
  return url.toString();
}

function isRecord(v: unknown): v is Readonly<Record<string, unknown>> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function num(obj: Readonly<Record<string, unknown>>, key: string): number {
  const v = obj[key];
  if (typeof v !== "number" || !Number.isFinite(v)) throw new Error(`forecast: "${key}" is not a number`);
  return v;
}

function firstNum(obj: Readonly<Record<string, unknown>>, key: string): number {
  const v = obj[key];
  const first: unknown = Array.isArray(v) ? v[0] : undefined;
  if (typeof first !== "number" || !Number.isFinite(first)) throw new Error(`forecast: "${key}[0]" is not a number`);
  return first;
}

/** Validate an Open-Meteo forecast body. Throws on a missing or mistyped field. */
export function parseForecast(body: unknown, locationName: string): WeatherReport {
  if (!isRecord(body) || !isRecord(body.current) || !isRecord(body.daily)) {
    throw new Error("forecast: missing current or daily block");
  }
  const current = body.current;
  const daily = body.daily;
  const { condition, description } = describeWmoCode(num(current, "weather_code"));
  return {
    location: locationName,
    condition,
    description,
    temperatureC: num(current, "temperature_2m"),
    feelsLikeC: num(current, "apparent_temperature"),
    humidity: num(current, "relative_humidity_2m"),
    highC: firstNum(daily, "temperature_2m_max"),
    lowC: firstNum(daily, "temperature_2m_min"),
  };
}

export function createOpenMeteoFetcher(
  opts: Readonly<{ fetch?: typeof fetch; timeoutMs?: number }> = {},
): WeatherFetcher {
  const doFetch = opts.fetch ?? fetch;
  const timeoutMs = opts.timeoutMs ?? 10_000;
  return async (query) => {
    const res = await doFetch(forecastUrl(query), { signal: AbortSignal.timeout(timeoutMs) });
    if (!res.ok) throw new Error(`forecast: HTTP ${String(res.status)}`);
    const body: unknown = await res.json();
    return parseForecast(body, query.locationName);
  };
}

export function convertTemperature(celsius: number, unit: TemperatureUnit): number {
  return unit === "fahrenheit" ? (celsius * 9) / 5 + 32 : celsius;
}

function unitSymbol(unit: TemperatureUnit): string {
  return unit === "fahrenheit" ? "°F" : "°C";
}

function temp(celsius: number, unit: TemperatureUnit): string {
  return `${Math.round(convertTemperature(celsius, unit)).toFixed(0)}${unitSymbol(unit)}`;
}

export function formatWeather(report: WeatherReport, opts: WeatherOptions): string {
  const icon = opts.showIcon ? `${ICONS[report.condition]} ` : "";
  return `${icon}${temp(report.temperatureC, opts.unit)}`;
}

export function formatWeatherTooltip(report: WeatherReport | null, unit: TemperatureUnit): string {
  if (report === null) return "Weather data not available";
  return (
    `${report.location}\n${report.description}\n\n` +
    `Temperature: ${temp(report.temperatureC, unit)}\n` +
    `Feels like: ${temp(report.feelsLikeC, unit)}\n` +
    `Humidity: ${String(Math.round(report.humidity))}%\n` +
    `High: ${temp(report.highC, unit)} / Low: ${temp(report.lowC, unit)}`
  );
}

export class WeatherModule extends PolledModule<WeatherReport | null> {
  readonly id = "weather";
  readonly name = "Weather";
  private readonly fetcher: WeatherFetcher;
  private options: WeatherOptions | null = null;

  constructor(deps: ModuleDeps & Readonly<{ fetcher?: WeatherFetcher }>) {
    super(null, deps);
    this.fetcher = deps.fetcher ?? createOpenMeteoFetcher();
  }

  update(config: BarConfig): void {
    this.options = config.modules.weather;
    super.update(config);
  }

  protected probeEnabled(config: BarConfig): boolean {
    const w = config.modules.weather;
    return w.enabled && w.latitude !== null && w.longitude !== null;
  }

  protected intervalMs(config: BarConfig): number {
    return config.modules.weather.refreshMinutes * 60_000;
  }

  protected refreshKey(config: BarConfig): string {
    const w = config.modules.weather;
    return `${String(w.latitude)},${String(w.longitude)}`;
  }

  protected probe(config: BarConfig): Promise<WeatherReport> {
    const w = config.modules.weather;
    return this.fetcher({ latitude: w.latitude ?? 0, longitude: w.longitude ?? 0, locationName: w.locationName });
  }

  isVisible(): boolean {
    return this.options !== null && this.options.enabled && this.current !== null;
  }

  displayText(config: BarConfig): string {
    const report = this.current;
    if (!config.modules.weather.enabled || report === null) return "";
    return formatWeather(report, config.modules.weather);
  }

  tooltip(): string {
    return formatWeatherTooltip(this.current, this.options?.unit ?? "celsius");
  }

  onClick(ctx: ModuleActionContext): void {
    ctx.requestCommand({ kind: "openUrl", url: WEATHER_SITE_URL });
  }
}
