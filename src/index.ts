import ActivityExtractor, { selectColumns, toTable } from "./activityExtractor";
import ActivitySync from "./activitySync";
import Warehouse from "./warehouse";
import { StravaClient } from "./shared/stravaClient";
import { loadConfig } from "./shared/config";
import { lastDaysWindow, resolveWindow, windowFileName, yearToWindow } from "./timeWindow";

export * from "./shared/types";
export {
  ActivityExtractor,
  ActivitySync,
  Warehouse,
  StravaClient,
  loadConfig,
  selectColumns,
  toTable,
  lastDaysWindow,
  resolveWindow,
  windowFileName,
  yearToWindow,
};
export default { ActivityExtractor, ActivitySync, Warehouse, StravaClient };
