import * as path from "path";
import { AppConfig } from "./shared/config";
import { StravaClient } from "./shared/stravaClient";
import { SyncOptions, SyncResult } from "./shared/types";
import ActivityExtractor from "./activityExtractor";
import Warehouse from "./warehouse";
import { resolveWindow, windowFileName } from "./timeWindow";

/**
 * Strava → CSV → warehouse pipeline for one time window
 */
export class ActivitySync {
  private config: AppConfig;
  private extractor: ActivityExtractor;
  private warehouse: Warehouse;

  constructor(config: AppConfig) {
    this.config = config;
    this.extractor = new ActivityExtractor(new StravaClient(config.strava), config.mockMode);
    this.warehouse = new Warehouse(config.warehouse);
  }

  async run(options: SyncOptions = {}): Promise<SyncResult> {
    const window = resolveWindow(options.year, options.now);
    if (window.year !== undefined) {
      console.log(`📅 Downloading activities for year: ${window.year}`);
    } else {
      console.log("📅 No year specified, downloading activities from the last 7 days only");
    }

    const csvPath = path.join(this.config.dataDir, windowFileName(window));
    const fetched = await this.extractor.extract(window, csvPath, options.saveRaw ?? false);

    // The warehouse is loaded even when nothing new was fetched
    try {
      await this.warehouse.setup();
      const loadedFiles = await this.warehouse.upsertCsvFiles(this.config.dataDir);
      const totalRows = await this.warehouse.countActivities();
      console.log(`📊 ${totalRows} activities in warehouse`);

      return { csvPath, fetched, loadedFiles, totalRows };
    } finally {
      this.warehouse.close();
    }
  }
}

export default ActivitySync;
