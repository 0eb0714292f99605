// Raw activity as returned by GET /athlete/activities (summary representation)
export interface StravaActivity {
  id: number;
  name: string;
  start_date_local: string;   // local time, e.g. "2024-03-01T07:00:00Z"
  type: string;               // e.g. "Run", "Ride", "Workout", "VirtualRide"
  distance: number;           // meters
  moving_time: number;        // seconds
  [field: string]: unknown;
}

// Columns kept from each activity, in output order
export const ACTIVITY_COLUMNS = [
  "id",
  "name",
  "start_date_local",
  "type",
  "distance",
  "moving_time",
] as const;

export type ActivityColumn = (typeof ACTIVITY_COLUMNS)[number];

export type ActivityRecord = Record<string, unknown>;

// Column-oriented view over a list of records
export interface ActivityTable {
  columns: string[];
  rows: ActivityRecord[];
}

// Half-open [after, before) range of Unix seconds
export interface TimeWindow {
  after: number;
  before: number;
  year?: number;
}

export interface TokenResponse {
  token_type?: string;
  access_token: string;
  refresh_token?: string;
  expires_at?: number;
  expires_in?: number;
}

// Row of the `activities` view
export interface ActivityViewRow {
  id: number;
  name: string | null;
  startDate: string | null;
  type: string | null;
  workoutType: string | null;
  coach: string | null;
  distanceKm: number | null;
  movingTimeMin: number | null;
}

export interface SyncOptions {
  year?: number;
  saveRaw?: boolean;
  now?: Date;
}

export interface SyncResult {
  csvPath: string;
  fetched: number;
  loadedFiles: string[];
  totalRows: number;
}
