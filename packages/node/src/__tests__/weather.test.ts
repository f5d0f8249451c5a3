import assert from "node:assert/strict";
import test from "node:test";
import { type BarConfig, createAsyncBridge, resolveBarConfig } from "@stripbar/core";
import { createCapturingLogger } from "@stripbar/testkit";
import {
  type WeatherQuery,
  type WeatherReport,
  WeatherModule,
  createOpenMeteoFetcher,
  describeWmoCode,
  formatWeather,
  formatWeatherTooltip,
  parseForecast,
} from "../modules/weather.js";

const REPORT: WeatherReport = {
  location: "Testville",
  condition: "clear",
  description: "Clear sky",
  temperatureC: 21.6,
  feelsLikeC: 20.2,
  humidity: 55,
  highC: 25.4,
  lowC: 14.5,
};

const FORECAST_BODY = {
  current: { temperature_2m: 21.6, apparent_temperature: 20.2, relative_humidity_2m: 55, weather_code: 0 },
  daily: { temperature_2m_max: [25.4], temperature_2m_min: [14.5] },
};

function enabledConfig(latitude = 52.5): BarConfig {
  return resolveBarConfig({
    modules: { weather: { enabled: true, latitude, longitude: 13.4, locationName: "Testville" } },
  });
}

test("describeWmoCode groups codes into conditions", () => {
  assert.deepEqual(describeWmoCode(0), { condition: "clear", description: "Clear sky" });
  assert.deepEqual(describeWmoCode(2), { condition: "partlyCloudy", description: "Partly cloudy" });
  assert.deepEqual(describeWmoCode(53), { condition: "rain", description: "Drizzle" });
  assert.deepEqual(describeWmoCode(63), { condition: "rain", description: "Rain" });
  assert.deepEqual(describeWmoCode(65), { condition: "heavyRain", description: "Heavy rain" });
  assert.deepEqual(describeWmoCode(73), { condition: "snow", description: "Snow" });
  assert.deepEqual(describeWmoCode(96), { condition: "thunderstorm", description: "Thunderstorm" });
  assert.deepEqual(describeWmoCode(1234), { condition: "unknown", description: "Unknown" });
});

test("parseForecast reads the current and daily blocks", () => {
  assert.deepEqual(parseForecast(FORECAST_BODY, "Testville"), REPORT);
});

test("parseForecast rejects malformed bodies", () => {
  assert.throws(() => parseForecast(null, "x"), /missing current or daily block/);
  assert.throws(
    () => parseForecast({ ...FORECAST_BODY, current: { ...FORECAST_BODY.current, temperature_2m: "warm" } }, "x"),
    /"temperature_2m" is not a number/,
  );
  assert.throws(
    () => parseForecast({ ...FORECAST_BODY, daily: { temperature_2m_max: [], temperature_2m_min: [1] } }, "x"),
    /"temperature_2m_max\[0\]" is not a number/,
  );
});

test("formatWeather rounds and converts the temperature", () => {
  const opts = enabledConfig().modules.weather;
  assert.equal(formatWeather(REPORT, opts), "☀️ 22°C");
  assert.equal(formatWeather(REPORT, { ...opts, unit: "fahrenheit", showIcon: false }), "71°F");
});

test("formatWeatherTooltip lists the details", () => {
  assert.equal(
    formatWeatherTooltip(REPORT, "celsius"),
    "Testville\nClear sky\n\nTemperature: 22°C\nFeels like: 20°C\nHumidity: 55%\nHigh: 25°C / Low: 15°C",
  );
  assert.equal(formatWeatherTooltip(null, "celsius"), "Weather data not available");
});

test("the Open-Meteo fetcher queries the coordinates and parses the body", async () => {
  const urls: string[] = [];
  const fetcher = createOpenMeteoFetcher({
    fetch: async (input) => {
      urls.push(String(input));
      return new Response(JSON.stringify(FORECAST_BODY), { status: 200 });
    },
  });
  const report = await fetcher({ latitude: 52.5, longitude: 13.4, locationName: "Testville" });
  assert.deepEqual(report, REPORT);

  const url = new URL(urls[0] ?? "");
  assert.equal(url.origin + url.pathname, "https://api.open-meteo.com/v1/forecast");
  assert.equal(url.searchParams.get("latitude"), "52.5");
  assert.equal(url.searchParams.get("longitude"), "13.4");
  assert.equal(url.searchParams.get("daily"), "temperature_2m_max,temperature_2m_min");
});

test("the Open-Meteo fetcher fails on HTTP errors", async () => {
  const fetcher = createOpenMeteoFetcher({ fetch: async () => new Response("", { status: 503 }) });
  await assert.rejects(fetcher({ latitude: 0, longitude: 0, locationName: "" }), /forecast: HTTP 503/);
});

function fakeWeather() {
  const queries: WeatherQuery[] = [];
  const resolvers: Array<(r: WeatherReport) => void> = [];
  const fetcher = (q: WeatherQuery): Promise<WeatherReport> => {
    queries.push(q);
    return new Promise((resolve) => resolvers.push(resolve));
  };
  return { queries, resolvers, fetcher };
}

test("a fetch finishing after update() is seen by the next update()", async () => {
  const bridge = createAsyncBridge({ schedule: () => {} });
  const { logger } = createCapturingLogger();
  const fake = fakeWeather();
  let now = 0;
  const module = new WeatherModule({ bridge, logger, fetcher: fake.fetcher, now: () => now });
  const config = enabledConfig();

  module.update(config);
  assert.equal(fake.queries.length, 1);
  assert.deepEqual(fake.queries[0], { latitude: 52.5, longitude: 13.4, locationName: "Testville" });
  assert.equal(module.displayText(config), "");
  assert.equal(module.isVisible(), false);

  fake.resolvers[0]?.(REPORT);
  await module.settled();
  assert.deepEqual(bridge.drain(), ["weather"]);
  assert.equal(module.displayText(config), "");

  now = 1000;
  module.update(config);
  assert.equal(module.displayText(config), "☀️ 22°C");
  assert.equal(module.isVisible(), true);
  assert.equal(fake.queries.length, 1);
});

test("an in-flight fetch is never started twice", () => {
  const fake = fakeWeather();
  const { logger } = createCapturingLogger();
  const module = new WeatherModule({
    bridge: createAsyncBridge({ schedule: () => {} }),
    logger,
    fetcher: fake.fetcher,
    now: () => 0,
  });
  const config = enabledConfig();
  module.update(config);
  module.update(config);
  assert.equal(fake.queries.length, 1);
  assert.equal(module.refreshing, true);
});

test("moving the location refetches before the interval elapses", async () => {
  const fake = fakeWeather();
  const { logger } = createCapturingLogger();
  const module = new WeatherModule({
    bridge: createAsyncBridge({ schedule: () => {} }),
    logger,
    fetcher: fake.fetcher,
    now: () => 0,
  });
  module.update(enabledConfig(52.5));
  fake.resolvers[0]?.(REPORT);
  await module.settled();

  module.update(enabledConfig(52.5));
  assert.equal(fake.queries.length, 1);
  module.update(enabledConfig(48.1));
  assert.equal(fake.queries.length, 2);
  assert.equal(fake.queries[1]?.latitude, 48.1);
});

test("a disabled module neither fetches nor shows text", () => {
  const fake = fakeWeather();
  const { logger } = createCapturingLogger();
  const module = new WeatherModule({
    bridge: createAsyncBridge({ schedule: () => {} }),
    logger,
    fetcher: fake.fetcher,
  });
  const config = resolveBarConfig({ modules: { weather: { latitude: 1, longitude: 1 } } });
  module.update(config);
  assert.equal(fake.queries.length, 0);
  assert.equal(module.displayText(config), "");
  assert.equal(module.isVisible(), false);
});

test("a click asks for the weather site", () => {
  const { logger } = createCapturingLogger();
  const module = new WeatherModule({ bridge: createAsyncBridge(), logger, fetcher: fakeWeather().fetcher });
  const commands: unknown[] = [];
  module.onClick({
    config: enabledConfig(),
    anchor: { x: 0, y: 0, w: 1, h: 1 },
    requestCommand: (c) => commands.push(c),
  });
  assert.deepEqual(commands, [{ kind: "openUrl", url: "https://weather.com" }]);
});
