import { Hono } from "hono";
import { logger } from "hono/logger";
import { corsMiddleware } from "./middleware/cors-middleware";
import { airQualityRoutes } from "./routes/air-quality";
import type { CityService } from "./services/city-service";
import { AqiError } from "./services/errors";
import type { IngestionService } from "./services/ingestion-service";

export interface AppDeps {
  cityService: CityService;
  ingestion: IngestionService;
  cities: readonly string[];
  corsOrigins: readonly string[];
}

export function createApp(deps: AppDeps) {
  const app = new Hono();

  app.use("*", corsMiddleware(deps.corsOrigins));
  app.use(logger());

  app.route(
    "/api",
    airQualityRoutes({
      cityService: deps.cityService,
      ingestion: deps.ingestion,
      cities: deps.cities,
    })
  );

  // Root health check
  app.get("/", (c) => {
    return c.json({ status: "OK", message: "AQI backend running" });
  });

  app.notFound((c) => c.json({ error: "Not Found" }, 404));

  app.onError((error, c) => {
    if (error instanceof AqiError) {
      if (error.kind === "InvalidInput") {
        return c.json({ error: error.kind, message: error.message }, 400);
      }
      console.error("Upstream error:", error);
      return c.json({ error: error.kind, message: error.message }, 502);
    }

    console.error("Server error:", error);
    return c.json(
      { error: "Internal Server Error", message: error.message },
      500
    );
  });

  return app;
}
