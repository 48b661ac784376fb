import Database from "better-sqlite3";

export interface StoredMeasurement {
  id: number;
  city: string;
  timestamp: string;
  aqi: number | null;
  pm25: number | null;
  pm10: number | null;
}

export type NewMeasurement = Omit<StoredMeasurement, "id">;

export interface CityRanking {
  city: string;
  aqi: number;
}

const SCHEMA = `CREATE TABLE IF NOT EXISTS measurements(
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  city TEXT NOT NULL,
  timestamp TEXT NOT NULL,
  aqi INTEGER,
  pm25 REAL,
  pm10 REAL
);
CREATE INDEX IF NOT EXISTS idx_measurements_city_timestamp
  ON measurements(city COLLATE NOCASE, timestamp);`;

/**
 * SQLite-backed measurement history. Absent values are stored as NULL and
 * read back as null, never as 0.
 */
export class MeasurementStore {
  private readonly db: Database.Database;

  constructor(filename: string = "aqi.db") {
    this.db = new Database(filename);
    this.db.exec(SCHEMA);
  }

  saveMeasurement(measurement: NewMeasurement): StoredMeasurement {
    const result = this.db
      .prepare(
        "INSERT INTO measurements(city, timestamp, aqi, pm25, pm10) VALUES (?, ?, ?, ?, ?)"
      )
      .run(
        measurement.city,
        measurement.timestamp,
        measurement.aqi,
        measurement.pm25,
        measurement.pm10
      );

    return { id: Number(result.lastInsertRowid), ...measurement };
  }

  getLatestMeasurement(city: string): StoredMeasurement | undefined {
    return this.db
      .prepare<[string], StoredMeasurement>(
        `SELECT id, city, timestamp, aqi, pm25, pm10 FROM measurements
         WHERE city = ? COLLATE NOCASE
         ORDER BY timestamp DESC, id DESC LIMIT 1`
      )
      .get(city);
  }

  // Cities with no computed AQI are left out rather than ranked as 0.
  // City names are grouped without regard to case.
  getTopCities(limit: number = 10): CityRanking[] {
    return this.db
      .prepare<[number], CityRanking>(
        `SELECT city, MAX(aqi) AS aqi FROM measurements
         WHERE aqi IS NOT NULL
         GROUP BY city COLLATE NOCASE
         ORDER BY aqi DESC, city COLLATE NOCASE ASC
         LIMIT ?`
      )
      .all(limit);
  }

  listCities(): string[] {
    return this.db
      .prepare<[], { city: string }>(
        `SELECT MIN(city) AS city FROM measurements
         GROUP BY city COLLATE NOCASE
         ORDER BY city COLLATE NOCASE ASC`
      )
      .all()
      .map((row) => row.city);
  }

  close(): void {
    this.db.close();
  }
}
