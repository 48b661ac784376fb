import { calculateAqi } from "./aqi-calculator";
import { errorMessage } from "./errors";
import type { MeasurementStore, StoredMeasurement } from "./measurement-store";
import { extractParticulates, type LatestFetcher } from "./openaq-service";

export interface IngestionFailure {
  city: string;
  error: string;
}

export interface IngestionSummary {
  startedAt: string;
  saved: StoredMeasurement[];
  skipped: string[];
  failed: IngestionFailure[];
}

type Clock = () => Date;

interface InFlightRun {
  key: string;
  run: Promise<IngestionSummary>;
}

function cityListKey(cities: readonly string[]): string {
  return cities.map((city) => city.toLowerCase()).join("\n");
}

export class IngestionService {
  private inFlight: InFlightRun | null = null;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly fetcher: LatestFetcher,
    private readonly store: MeasurementStore,
    private readonly now: Clock = () => new Date()
  ) {}

  /**
   * Fetches one city, computes its AQI and persists the result under the
   * provider's reading time (or now, when the provider gives none). A city
   * already stored keeps its stored spelling. Returns null when the provider
   * has no results for the city. Errors propagate.
   */
  async ingestCity(city: string): Promise<StoredMeasurement | null> {
    const payload = await this.fetcher.fetchCityLatest(city);
    const readings = extractParticulates(payload);
    if (!readings) {
      console.warn(`No OpenAQ results for ${city}, nothing stored`);
      return null;
    }

    const result = calculateAqi(readings);
    const saved = this.store.saveMeasurement({
      city: this.store.getLatestMeasurement(city)?.city ?? city,
      timestamp: this.readingTime(readings.lastUpdated),
      aqi: result.aqi,
      pm25: result.pm25,
      pm10: result.pm10,
    });

    console.log(
      `Stored ${city}: AQI=${result.aqi ?? "n/a"} (PM2.5=${
        result.pm25 ?? "n/a"
      }, PM10=${result.pm10 ?? "n/a"})`
    );
    return saved;
  }

  /**
   * Ingests every city concurrently. A failing city is logged and reported in
   * the summary without stopping the others. A call for the same cities as the
   * run in flight shares that run; a call for other cities starts once it ends.
   */
  runIngestion(cities: readonly string[]): Promise<IngestionSummary> {
    const key = cityListKey(cities);
    if (this.inFlight) {
      if (this.inFlight.key === key) {
        console.log("Ingestion already running, joining the current run");
        return this.inFlight.run;
      }
      console.log("Ingestion already running, queueing a run for other cities");
      const next = () => this.runIngestion(cities);
      return this.inFlight.run.then(next, next);
    }

    const run = this.ingestAll(cities).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = { key, run };
    return run;
  }

  startScheduler(cities: readonly string[], intervalMinutes: number): void {
    if (this.timer) return;

    const intervalMs = intervalMinutes * 60 * 1000;
    console.log(
      `Scheduling ingestion of ${cities.length} cities every ${intervalMinutes} minutes`
    );
    this.timer = setInterval(() => {
      this.runIngestion(cities).catch((error: unknown) => {
        console.error("Scheduled ingestion failed:", error);
      });
    }, intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private readingTime(lastUpdated: string | null): string {
    if (lastUpdated) {
      const parsed = new Date(lastUpdated);
      if (!Number.isNaN(parsed.getTime())) {
        return parsed.toISOString();
      }
      console.warn(`Ignoring unparseable OpenAQ timestamp: ${lastUpdated}`);
    }
    return this.now().toISOString();
  }

  private async ingestAll(
    cities: readonly string[]
  ): Promise<IngestionSummary> {
    const summary: IngestionSummary = {
      startedAt: this.now().toISOString(),
      saved: [],
      skipped: [],
      failed: [],
    };

    const outcomes = await Promise.allSettled(
      cities.map((city) => this.ingestCity(city))
    );

    outcomes.forEach((outcome, i) => {
      const city = cities[i];
      if (outcome.status === "rejected") {
        console.error(`Ingestion failed for ${city}:`, outcome.reason);
        summary.failed.push({ city, error: errorMessage(outcome.reason) });
      } else if (outcome.value === null) {
        summary.skipped.push(city);
      } else {
        summary.saved.push(outcome.value);
      }
    });

    console.log(
      `Ingestion finished: ${summary.saved.length} saved, ${summary.skipped.length} skipped, ${summary.failed.length} failed`
    );
    return summary;
  }
}
