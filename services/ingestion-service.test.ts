import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { IngestionService } from "./ingestion-service";
import { MeasurementStore } from "./measurement-store";
import type { LatestFetcher, LatestResponse } from "./openaq-service";
import { UpstreamError } from "./errors";

const NOW = new Date("2024-11-02T06:00:00.000Z");

function payload(pm25: unknown, pm10: unknown): LatestResponse {
  const measurements: { parameter: string; value: unknown }[] = [];
  if (pm25 !== undefined) measurements.push({ parameter: "pm25", value: pm25 });
  if (pm10 !== undefined) measurements.push({ parameter: "pm10", value: pm10 });
  return { results: [{ measurements }] };
}

class StubFetcher implements LatestFetcher {
  calls: string[] = [];

  constructor(private readonly responses: Record<string, LatestResponse | Error>) {}

  async fetchCityLatest(city: string): Promise<LatestResponse> {
    this.calls.push(city);
    const response = this.responses[city];
    if (response === undefined) return { results: [] };
    if (response instanceof Error) throw response;
    return response;
  }
}

describe("IngestionService", () => {
  let store: MeasurementStore;

  beforeEach(() => {
    store = new MeasurementStore(":memory:");
  });

  afterEach(() => {
    store.close();
    vi.useRealTimers();
  });

  it("computes and stores the AQI for a city", async () => {
    const fetcher = new StubFetcher({ Delhi: payload(45, 150) });
    const service = new IngestionService(fetcher, store, () => NOW);

    const saved = await service.ingestCity("Delhi");

    expect(saved).toEqual({
      id: 1,
      city: "Delhi",
      timestamp: "2024-11-02T06:00:00.000Z",
      aqi: 134,
      pm25: 45,
      pm10: 150,
    });
    expect(store.getLatestMeasurement("Delhi")).toEqual(saved);
  });

  it("stores the provider's reading time when it gives one", async () => {
    const fetcher = new StubFetcher({
      Delhi: {
        results: [
          {
            measurements: [
              {
                parameter: "pm25",
                value: 45,
                lastUpdated: "2024-11-02T11:15:00+05:30",
              },
            ],
          },
        ],
      },
      Mumbai: {
        results: [
          {
            measurements: [
              { parameter: "pm10", value: 40, lastUpdated: "yesterday-ish" },
            ],
          },
        ],
      },
    });
    const service = new IngestionService(fetcher, store, () => NOW);

    expect((await service.ingestCity("Delhi"))?.timestamp).toBe(
      "2024-11-02T05:45:00.000Z"
    );
    expect((await service.ingestCity("Mumbai"))?.timestamp).toBe(
      "2024-11-02T06:00:00.000Z"
    );
  });

  it("keeps the stored spelling of a city requested in another case", async () => {
    const fetcher = new StubFetcher({
      Delhi: payload(45, undefined),
      delhi: payload(45, undefined),
    });
    const service = new IngestionService(fetcher, store, () => NOW);

    await service.ingestCity("Delhi");
    const saved = await service.ingestCity("delhi");

    expect(saved?.city).toBe("Delhi");
    expect(store.getTopCities()).toEqual([{ city: "Delhi", aqi: 76 }]);
  });

  it("stores a null AQI when the city reports neither pollutant", async () => {
    const fetcher = new StubFetcher({ Pune: payload(undefined, undefined) });
    const service = new IngestionService(fetcher, store, () => NOW);

    const saved = await service.ingestCity("Pune");

    expect(saved?.aqi).toBeNull();
    expect(saved?.pm25).toBeNull();
    expect(saved?.pm10).toBeNull();
  });

  it("summarises saved, skipped and failed cities", async () => {
    const fetcher = new StubFetcher({
      Delhi: payload(600, undefined),
      Mumbai: payload(undefined, 40),
      Kolkata: payload("not-a-number", 80),
      Bengaluru: new UpstreamError("OpenAQ request for Bengaluru failed: timeout"),
    });
    const service = new IngestionService(fetcher, store, () => NOW);

    const summary = await service.runIngestion([
      "Delhi",
      "Mumbai",
      "Kolkata",
      "Bengaluru",
      "Hyderabad",
    ]);

    expect(summary.startedAt).toBe("2024-11-02T06:00:00.000Z");
    expect(summary.saved.map((row) => [row.city, row.aqi])).toEqual([
      ["Delhi", 1331],
      ["Mumbai", 40],
    ]);
    expect(summary.skipped).toEqual(["Hyderabad"]);
    expect(summary.failed).toEqual([
      {
        city: "Kolkata",
        error: "pm25 concentration is not a finite number: not-a-number",
      },
      {
        city: "Bengaluru",
        error: "OpenAQ request for Bengaluru failed: timeout",
      },
    ]);
    expect(store.listCities()).toEqual(["Delhi", "Mumbai"]);
  });

  it("shares an in-flight run instead of starting another", async () => {
    const fetcher = new StubFetcher({ Delhi: payload(45, undefined) });
    const service = new IngestionService(fetcher, store, () => NOW);

    const first = service.runIngestion(["Delhi"]);
    const second = service.runIngestion(["Delhi"]);

    expect(second).toBe(first);
    await first;
    expect(fetcher.calls).toEqual(["Delhi"]);

    await service.runIngestion(["Delhi"]);
    expect(fetcher.calls).toEqual(["Delhi", "Delhi"]);
  });

  it("runs a different city list after the current run instead of joining it", async () => {
    const fetcher = new StubFetcher({
      Delhi: payload(45, undefined),
      Mumbai: payload(undefined, 40),
    });
    const service = new IngestionService(fetcher, store, () => NOW);

    const first = service.runIngestion(["Delhi"]);
    const second = service.runIngestion(["Mumbai"]);

    expect(second).not.toBe(first);
    const [firstSummary, secondSummary] = await Promise.all([first, second]);
    expect(firstSummary.saved.map((row) => row.city)).toEqual(["Delhi"]);
    expect(secondSummary.saved.map((row) => row.city)).toEqual(["Mumbai"]);
    expect(fetcher.calls).toEqual(["Delhi", "Mumbai"]);
  });

  it("runs on the configured interval until stopped", async () => {
    vi.useFakeTimers();
    const fetcher = new StubFetcher({ Delhi: payload(45, undefined) });
    const service = new IngestionService(fetcher, store, () => NOW);

    service.startScheduler(["Delhi"], 10);
    expect(fetcher.calls).toEqual([]);

    await vi.advanceTimersByTimeAsync(10 * 60 * 1000);
    expect(fetcher.calls).toEqual(["Delhi"]);

    service.stop();
    await vi.advanceTimersByTimeAsync(30 * 60 * 1000);
    expect(fetcher.calls).toEqual(["Delhi"]);
  });
});
