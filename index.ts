import { createServer, type IncomingMessage } from "node:http";
import { createApp } from "./app";
import { loadEnvFiles, parseConfig } from "./config/environment";
import { CityService } from "./services/city-service";
import { IngestionService } from "./services/ingestion-service";
import { MeasurementStore } from "./services/measurement-store";
import { OpenAqService } from "./services/openaq-service";

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });
}

export function main() {
  loadEnvFiles();
  const config = parseConfig(process.env);

  console.log("Environment loaded:", {
    PORT: config.port,
    DB_FILE: config.dbFile,
    CITIES: config.cities.join(","),
    INGEST_MINUTES: config.ingestMinutes,
  });

  const store = new MeasurementStore(config.dbFile);
  const ingestion = new IngestionService(new OpenAqService(config.openaq), store);
  const cityService = new CityService(store, ingestion);
  const app = createApp({
    cityService,
    ingestion,
    cities: config.cities,
    corsOrigins: config.corsOrigins,
  });

  // Create a standard HTTP server with Hono
  const server = createServer(async (req, res) => {
    try {
      const url = new URL(
        req.url || "/",
        `http://${req.headers.host || "localhost"}`
      );

      // Convert Node's req/res to Fetch API Request/Response
      const method = req.method || "GET";
      const headers = new Headers();
      Object.entries(req.headers).forEach(([key, value]) => {
        if (value)
          headers.set(key, Array.isArray(value) ? value.join(", ") : value);
      });

      const requestInit: RequestInit = { method, headers };
      if (!["GET", "HEAD", "OPTIONS"].includes(method)) {
        requestInit.body = await readBody(req);
      }

      const response = await app.fetch(new Request(url.toString(), requestInit));

      res.statusCode = response.status;
      response.headers.forEach((value, key) => {
        res.setHeader(key, value);
      });
      res.end(await response.text());
    } catch (error) {
      console.error("Server error:", error);
      if (!res.headersSent) {
        res.writeHead(500, { "Content-Type": "application/json" });
      }
      if (!res.writableEnded) {
        res.end(
          JSON.stringify({
            error: "Internal Server Error",
            message: error instanceof Error ? error.message : String(error),
          })
        );
      }
    }
  });

  ingestion.startScheduler(config.cities, config.ingestMinutes);

  server.listen(config.port, () => {
    console.log(`Server is running on http://localhost:${config.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`);
    ingestion.stop();
    server.close(() => {
      store.close();
      process.exit(0);
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  return server;
}

// Only start the server if this file is executed directly
if (require.main === module) {
  main();
}
