import { Hono } from "hono";
import { z } from "zod";
import type { CityService } from "../services/city-service";
import type { IngestionService } from "../services/ingestion-service";

const topCitiesQuery = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

const aqiRequestBody = z.object({
  pm25: z.unknown().optional(),
  pm10: z.unknown().optional(),
});

export interface AirQualityRouteDeps {
  cityService: CityService;
  ingestion: IngestionService;
  cities: readonly string[];
}

export function airQualityRoutes({
  cityService,
  ingestion,
  cities,
}: AirQualityRouteDeps) {
  const app = new Hono();

  // Cities ranked by their worst stored AQI
  app.get("/top-cities", (c) => {
    const query = topCitiesQuery.safeParse({ limit: c.req.query("limit") });
    if (!query.success) {
      return c.json(
        { error: "InvalidInput", message: "limit must be an integer from 1 to 100" },
        400
      );
    }

    return c.json({ cities: cityService.getTopCities(query.data.limit) });
  });

  // Latest AQI report for one city
  app.get("/city/:city", async (c) => {
    const city = c.req.param("city").trim();
    const refresh = c.req.query("refresh") === "true";

    console.log(
      `API request received for city report: ${city}${refresh ? " (refresh)" : ""}`
    );

    const report = await cityService.getCityReport(city, refresh);
    return c.json(report);
  });

  // On-demand calculation from raw concentrations
  app.post("/aqi", async (c) => {
    let payload: unknown;
    try {
      payload = await c.req.json();
    } catch (error) {
      console.warn("Rejected /aqi request with unreadable body:", error);
      return c.json(
        { error: "InvalidInput", message: "Request body must be JSON" },
        400
      );
    }

    const body = aqiRequestBody.safeParse(payload);
    if (!body.success) {
      return c.json(
        { error: "InvalidInput", message: "Request body must be a JSON object" },
        400
      );
    }

    return c.json(cityService.calculate(body.data));
  });

  // Run an ingestion pass for the configured cities now
  app.post("/ingest", async (c) => {
    const summary = await ingestion.runIngestion(cities);
    return c.json(summary);
  });

  return app;
}
