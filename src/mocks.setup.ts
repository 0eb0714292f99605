import { StravaActivity, TimeWindow } from "./shared/types";

/**
 * Templates for offline activities, shaped like Strava's summary activities
 */
const MOCK_TEMPLATES: { name: string; type: string; distance: number; moving_time: number }[] = [
  { name: "Morning Run", type: "Run", distance: 8012.4, moving_time: 2538 },
  { name: "Threshold Intervals with Maya", type: "Workout", distance: 0, moving_time: 2700 },
  { name: "Zwift - Watopia with Tom", type: "VirtualRide", distance: 30540.2, moving_time: 3605 },
  { name: "Lunch Ride", type: "Ride", distance: 42150.8, moving_time: 5412 },
  { name: "Easy Swim", type: "Swim", distance: 1500, moving_time: 1980 },
];

const toLocalTimestamp = (seconds: number): string =>
  new Date(seconds * 1000).toISOString().replace(/\.\d{3}Z$/, "Z");

/**
 * Generate deterministic activities spread evenly across a window
 */
export const generateMockActivities = (window: TimeWindow, count: number = MOCK_TEMPLATES.length): StravaActivity[] => {
  const span = window.before - window.after;
  const step = Math.floor(span / (count + 1));
  const activities: StravaActivity[] = [];

  for (let i = 0; i < count; i++) {
    const template = MOCK_TEMPLATES[i % MOCK_TEMPLATES.length];
    const startSeconds = window.after + step * (i + 1);

    activities.push({
      resource_state: 2,
      id: 9000000000 + startSeconds,
      name: template.name,
      start_date_local: toLocalTimestamp(startSeconds),
      type: template.type,
      sport_type: template.type,
      distance: template.distance,
      moving_time: template.moving_time,
      elapsed_time: template.moving_time + 120,
      total_elevation_gain: 0,
    });
  }

  return activities;
};
