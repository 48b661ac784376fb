import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { parseConcentration } from "./aqi-calculator";
import { UpstreamError, errorMessage } from "./errors";

// Shape of the OpenAQ v2 `latest` response, reduced to what we read
const latestMeasurementSchema = z
  .object({
    parameter: z.string(),
    value: z.unknown(),
    lastUpdated: z.string().optional(),
  })
  .passthrough();

const latestResponseSchema = z
  .object({
    results: z
      .array(
        z
          .object({
            location: z.string().optional(),
            city: z.string().nullable().optional(),
            measurements: z.array(latestMeasurementSchema).default([]),
          })
          .passthrough()
      )
      .nullable()
      .optional(),
  })
  .passthrough();

export type LatestResponse = z.infer<typeof latestResponseSchema>;

export interface ParticulateReadings {
  pm25: number | null;
  pm10: number | null;
  /** Provider's own timestamp for the most recent particulate reading, if given */
  lastUpdated: string | null;
}

export interface OpenAqOptions {
  url: string;
  country: string;
  timeoutMs: number;
}

/** Source of raw provider payloads; the ingestion and query paths depend on this only. */
export interface LatestFetcher {
  fetchCityLatest(city: string): Promise<LatestResponse>;
}

/**
 * Picks PM2.5 and PM10 out of the first result. The first measurement of each
 * parameter wins. A payload with no results yields no readings (null).
 */
export function extractParticulates(payload: unknown): ParticulateReadings | null {
  const parsed = latestResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new UpstreamError(
      `Unexpected OpenAQ response: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
        .join("; ")}`
    );
  }

  const results = parsed.data.results ?? [];
  if (results.length === 0) {
    return null;
  }

  let pm25: unknown;
  let pm10: unknown;
  let lastUpdated: string | null = null;
  for (const measurement of results[0].measurements) {
    if (measurement.parameter === "pm25" && pm25 === undefined) {
      pm25 = measurement.value;
      lastUpdated = lastUpdated ?? measurement.lastUpdated ?? null;
    }
    if (measurement.parameter === "pm10" && pm10 === undefined) {
      pm10 = measurement.value;
      lastUpdated = lastUpdated ?? measurement.lastUpdated ?? null;
    }
  }

  return {
    pm25: parseConcentration(pm25, "pm25"),
    pm10: parseConcentration(pm10, "pm10"),
    lastUpdated,
  };
}

export class OpenAqService implements LatestFetcher {
  constructor(
    private readonly options: OpenAqOptions,
    private readonly http: AxiosInstance = axios.create()
  ) {}

  async fetchCityLatest(city: string): Promise<LatestResponse> {
    console.log(`Fetching latest OpenAQ measurements for: ${city}`);

    try {
      const response = await this.http.get<unknown>(this.options.url, {
        params: { country: this.options.country, city },
        timeout: this.options.timeoutMs,
        headers: { Accept: "application/json" },
      });

      const parsed = latestResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new UpstreamError(
          `Invalid response structure from OpenAQ for ${city}`
        );
      }
      return parsed.data;
    } catch (error) {
      if (error instanceof UpstreamError) throw error;

      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        throw new UpstreamError(
          `OpenAQ request for ${city} failed${
            status ? ` with status ${status}` : ""
          }: ${error.message}`,
          { cause: error }
        );
      }
      throw new UpstreamError(
        `OpenAQ request for ${city} failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }
}
