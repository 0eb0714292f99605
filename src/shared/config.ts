import { AxiosAdapter } from "axios";

export const STRAVA_TOKEN_URL = "https://www.strava.com/oauth/token";
export const STRAVA_API_URL = "https://www.strava.com/api/v3";
export const HTTP_TIMEOUT_MS = 10000;
export const ACTIVITIES_PER_PAGE = 200;

export interface StravaConfig {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  tokenUrl: string;
  apiUrl: string;
  timeoutMs: number;
  perPage: number;
  // Replaces axios' HTTP transport (tests)
  adapter?: AxiosAdapter;
}

export interface WarehouseConfig {
  // "md:" for MotherDuck, otherwise a local DuckDB file or ":memory:"
  location: string;
  database: string;
  motherduckToken: string;
}

export interface AppConfig {
  strava: StravaConfig;
  warehouse: WarehouseConfig;
  dataDir: string;
  mockMode: boolean;
}

/**
 * Build the application config from environment variables.
 * Credentials are not validated here: a missing one surfaces when the
 * request that needs it fails.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    strava: {
      clientId: env.STRAVA_CLIENT_ID ?? "",
      clientSecret: env.STRAVA_CLIENT_SECRET ?? "",
      refreshToken: env.STRAVA_REFRESH_TOKEN ?? "",
      tokenUrl: STRAVA_TOKEN_URL,
      apiUrl: STRAVA_API_URL,
      timeoutMs: HTTP_TIMEOUT_MS,
      perPage: ACTIVITIES_PER_PAGE,
    },
    warehouse: {
      location: env.DUCKDB_LOCATION || "md:",
      database: env.DUCKDB_DATABASE || "strava",
      motherduckToken: env.MOTHER_DUCK_API_KEY ?? "",
    },
    dataDir: env.DATA_DIR || process.cwd(),
    mockMode: env.MOCK_MODE === "true",
  };
}

export default loadConfig;
