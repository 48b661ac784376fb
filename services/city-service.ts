import { getAqiCategory, type AqiCategory } from "../info/aqi-categories";
import { calculateAqi, type AqiResult } from "./aqi-calculator";
import type { IngestionService } from "./ingestion-service";
import type { MeasurementStore } from "./measurement-store";

export const NO_DATA_MESSAGE = "No data available";

export interface AqiReport extends AqiResult {
  category: AqiCategory | null;
  message?: string;
}

export interface CityReport extends AqiReport {
  city: string;
  timestamp: string | null;
}

export interface RankedCity {
  city: string;
  aqi: number;
  category: AqiCategory | null;
}

/** Adds the presentation fields; an absent AQI gets a message instead of a number. */
export function toAqiReport(result: AqiResult): AqiReport {
  const report: AqiReport = {
    ...result,
    category: getAqiCategory(result.aqi),
  };
  if (result.aqi === null) {
    report.message = NO_DATA_MESSAGE;
  }
  return report;
}

export class CityService {
  constructor(
    private readonly store: MeasurementStore,
    private readonly ingestion: IngestionService
  ) {}

  /**
   * Report for one city from the latest stored measurement. Fresh data is
   * fetched first when nothing is stored yet or `refresh` is set.
   */
  async getCityReport(city: string, refresh = false): Promise<CityReport> {
    let latest = refresh ? undefined : this.store.getLatestMeasurement(city);

    if (!latest) {
      console.log(`Fetching fresh measurements for ${city}`);
      latest =
        (await this.ingestion.ingestCity(city)) ??
        this.store.getLatestMeasurement(city);
    }

    if (!latest) {
      return {
        city,
        timestamp: null,
        ...toAqiReport(calculateAqi({})),
      };
    }

    // Recomputed from the stored concentrations so sub-indices are included
    return {
      city: latest.city,
      timestamp: latest.timestamp,
      ...toAqiReport(calculateAqi({ pm25: latest.pm25, pm10: latest.pm10 })),
    };
  }

  getTopCities(limit: number): RankedCity[] {
    return this.store.getTopCities(limit).map((row) => ({
      city: row.city,
      aqi: row.aqi,
      category: getAqiCategory(row.aqi),
    }));
  }

  calculate(readings: { pm25?: unknown; pm10?: unknown }): AqiReport {
    return toAqiReport(calculateAqi(readings));
  }
}
