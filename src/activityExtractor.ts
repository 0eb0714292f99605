import * as fs from "fs";
import * as path from "path";
import { stringify } from "csv-stringify/sync";
import { StravaClient } from "./shared/stravaClient";
import {
  ACTIVITY_COLUMNS,
  ActivityRecord,
  ActivityTable,
  StravaActivity,
  TimeWindow,
} from "./shared/types";
import { lastDaysWindow } from "./timeWindow";
import { generateMockActivities } from "./mocks.setup";

/**
 * Build a table from records; columns follow first appearance across rows
 */
export function toTable(records: ActivityRecord[]): ActivityTable {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }
  return { columns, rows: records };
}

/**
 * Narrow a table to the activity columns we persist.
 * Expected columns missing from a non-empty table are dropped with a warning.
 */
export function selectColumns(table: ActivityTable): ActivityTable {
  if (table.rows.length === 0) {
    return { columns: [...ACTIVITY_COLUMNS], rows: [] };
  }

  const present = new Set(table.columns);
  const columns: string[] = [];
  for (const column of ACTIVITY_COLUMNS) {
    if (present.has(column)) {
      columns.push(column);
    } else {
      console.warn(`⚠️  Expected column "${column}" missing from Strava response`);
    }
  }

  const rows = table.rows.map((row) => {
    const narrowed: ActivityRecord = {};
    for (const column of columns) {
      narrowed[column] = row[column];
    }
    return narrowed;
  });

  return { columns, rows };
}

/**
 * Activity extraction from Strava into CSV staging files
 */
export class ActivityExtractor {
  private stravaClient: StravaClient;
  private mockMode: boolean;

  constructor(stravaClient: StravaClient, mockMode: boolean = false) {
    this.stravaClient = stravaClient;
    this.mockMode = mockMode;
  }

  /**
   * Page through the athlete's activities until an empty page comes back
   */
  async fetchActivities(
    accessToken: string,
    window: TimeWindow = lastDaysWindow()
  ): Promise<ActivityTable> {
    console.log(
      `📥 Fetching activities from Strava (${new Date(window.after * 1000).toISOString()} → ${new Date(window.before * 1000).toISOString()})...`
    );

    const allActivities: StravaActivity[] = [];
    let page = 1;

    while (true) {
      const activities = await this.stravaClient.getActivitiesPage(accessToken, window, page);
      if (activities.length === 0) {
        break;
      }

      allActivities.push(...activities);
      console.log(`  ✓ Page ${page}: ${activities.length} activities`);
      page++;
    }

    return toTable(allActivities);
  }

  /**
   * Write a table to CSV (header row, no index column), replacing any existing file
   */
  async saveActivitiesToCsv(table: ActivityTable, outputPath: string): Promise<void> {
    const dir = path.dirname(outputPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const header = stringify([table.columns]);
    const body = stringify(table.rows, { columns: table.columns });
    fs.writeFileSync(outputPath, header + body, "utf-8");
    console.log(`✅ Activities saved to ${outputPath}`);
  }

  /**
   * Save raw API records next to the CSV for inspection
   */
  async saveRawActivities(activities: ActivityRecord[], csvPath: string): Promise<string> {
    const rawPath = csvPath.replace(/\.csv$/, "-raw.json");
    fs.writeFileSync(rawPath, JSON.stringify(activities, null, 2), "utf-8");
    console.log(`📋 Raw activities saved to ${rawPath}`);
    return rawPath;
  }

  /**
   * Authenticate, fetch, project and write one window's CSV.
   * Returns the number of activities written.
   */
  async extract(window: TimeWindow, outputPath: string, saveRaw: boolean = false): Promise<number> {
    let table: ActivityTable;
    if (this.mockMode) {
      console.log("🔓 Mock mode: Skipping authentication");
      table = toTable(generateMockActivities(window));
    } else {
      const accessToken = await this.stravaClient.getAccessToken();
      table = await this.fetchActivities(accessToken, window);
    }

    const projected = selectColumns(table);
    console.log(`📊 Downloaded ${projected.rows.length} activities`);

    await this.saveActivitiesToCsv(projected, outputPath);
    if (saveRaw) {
      await this.saveRawActivities(table.rows, outputPath);
    }

    return projected.rows.length;
  }
}

export default ActivityExtractor;
