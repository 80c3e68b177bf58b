// Ignore naming conventions for database tables

// Daily observations, one row per station and day
export interface WeatherRecords {
  station_id: string;
  /** ISO 8601 date (YYYY-MM-DD) */
  date: string;
  /** Tenths of a degree Celsius, -9999 when missing */
  max_temp: number;
  /** Tenths of a degree Celsius, -9999 when missing */
  min_temp: number;
  /** Tenths of a millimeter, -9999 when missing */
  precipitation: number;
}

// Derived per-station yearly statistics
export interface AnnualWeatherStats {
  station_id: string;
  year: number;
  /** Degrees Celsius */
  avg_max_temp: number | null;
  /** Degrees Celsius */
  avg_min_temp: number | null;
  /** Centimeters */
  total_precipitation: number | null;
}

export interface WeatherDatabase {
  weather_records: WeatherRecords;
  annual_weather_stats: AnnualWeatherStats;
}
