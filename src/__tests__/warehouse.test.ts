import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import Warehouse, { isMotherDuck } from "../warehouse";

const HEADER = "id,name,start_date_local,type,distance,moving_time";

/**
 * Integration tests against an in-memory DuckDB
 */
describe("Warehouse", () => {
  let tempDir: string;
  let warehouse: Warehouse;
  let warnSpy: jest.SpyInstance;

  const writeCsv = (fileName: string, lines: string[]) =>
    fs.writeFileSync(path.join(tempDir, fileName), [HEADER, ...lines].join("\n") + "\n");

  beforeEach(async () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "strava-warehouse-"));
    jest.spyOn(console, "log").mockImplementation(() => {});
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => {});
    warehouse = new Warehouse({ location: ":memory:", database: "strava", motherduckToken: "" });
    await warehouse.setup();
  });

  afterEach(() => {
    warehouse.close();
    jest.restoreAllMocks();
    if (fs.existsSync(tempDir)) {
      fs.rmSync(tempDir, { recursive: true });
    }
  });

  describe("setup", () => {
    it("should be idempotent", async () => {
      await expect(warehouse.setup()).resolves.toBeUndefined();
      expect(await warehouse.countActivities()).toBe(0);
    });

    it("should be safe to close twice and set up again afterwards", async () => {
      writeCsv("activities_2024.csv", ["1,Run,2024-03-01 07:00:00,Run,5000.0,1800"]);
      await warehouse.upsertCsvFiles(tempDir);

      warehouse.close();
      expect(() => warehouse.close()).not.toThrow();
      await expect(warehouse.countActivities()).rejects.toThrow(
        "Warehouse is not set up; call setup() first"
      );

      await warehouse.setup();
      expect(await warehouse.countActivities()).toBe(0);
    });

    it("should require setup before loading", async () => {
      const fresh = new Warehouse({ location: ":memory:", database: "strava", motherduckToken: "" });

      await expect(fresh.upsertCsvFiles(tempDir)).rejects.toThrow(
        "Warehouse is not set up; call setup() first"
      );
    });
  });

  describe("activities view", () => {
    it("should split workout type and coach for workouts", async () => {
      writeCsv("activities_2024.csv", ["1,Morning Run with Alex,2024-03-01 07:00:00,Workout,5000.0,1800"]);

      await warehouse.upsertCsvFiles(tempDir);

      expect(await warehouse.readActivities()).toEqual([
        {
          id: 1,
          name: "Morning Run with Alex",
          startDate: "2024-03-01 07:00:00",
          type: "Workout",
          workoutType: "Morning Run",
          coach: "Alex",
          distanceKm: 5,
          movingTimeMin: 30,
        },
      ]);
    });

    it("should keep the wall-clock time of Strava's UTC-suffixed local timestamps", async () => {
      writeCsv("activities_2024.csv", ["1,Run,2024-03-01T07:00:00Z,Run,5000.0,1800"]);

      await warehouse.upsertCsvFiles(tempDir);

      const [row] = await warehouse.readActivities();
      expect(row.startDate).toBe("2024-03-01 07:00:00");
    });

    it("should leave workout type and coach empty for other activity types", async () => {
      writeCsv("activities_2024.csv", ["2,Evening Ride,2024-03-01 18:00:00,Ride,10000.0,2400"]);

      await warehouse.upsertCsvFiles(tempDir);

      const [row] = await warehouse.readActivities();
      expect(row.workoutType).toBeNull();
      expect(row.coach).toBeNull();
      expect(row.distanceKm).toBe(10);
      expect(row.movingTimeMin).toBe(40);
    });

    it("should keep only the coach for virtual rides", async () => {
      writeCsv("activities_2024.csv", ["3,Zwift - Watopia with Tom,2024-03-02 06:00:00,VirtualRide,30540.2,3605"]);

      await warehouse.upsertCsvFiles(tempDir);

      const [row] = await warehouse.readActivities();
      expect(row.workoutType).toBeNull();
      expect(row.coach).toBe("Tom");
    });

    it("should return nulls for workouts whose name does not match", async () => {
      writeCsv("activities_2024.csv", ["4,Core Session,2024-03-03 12:00:00,Workout,0.0,900"]);

      await warehouse.upsertCsvFiles(tempDir);

      const [row] = await warehouse.readActivities();
      expect(row.workoutType).toBeNull();
      expect(row.coach).toBeNull();
    });

    it("should match the last ' with ' in the name", async () => {
      writeCsv("activities_2024.csv", ["5,Intervals with Bob with Carol,2024-03-04 12:00:00,Workout,0.0,600"]);

      await warehouse.upsertCsvFiles(tempDir);

      const [row] = await warehouse.readActivities();
      expect(row.workoutType).toBe("Intervals with Bob");
      expect(row.coach).toBe("Carol");
    });

    it("should divide before rounding distance and time", async () => {
      writeCsv("activities_2024.csv", ["6,Long Run,2024-03-05 08:00:00,Run,5500.0,1830"]);

      await warehouse.upsertCsvFiles(tempDir);

      const [row] = await warehouse.readActivities();
      expect(row.distanceKm).toBe(5);
      expect(row.movingTimeMin).toBe(30);
    });
  });

  describe("upsertCsvFiles", () => {
    it("should update matched ids and insert new ones", async () => {
      writeCsv("activities_2024.csv", ["1,Old,2024-03-01 07:00:00,Run,5000.0,1800"]);
      await warehouse.upsertCsvFiles(tempDir);

      writeCsv("activities_2024.csv", [
        "1,New,2024-03-01 07:00:00,Run,5000.0,1800",
        "3,Fresh,2024-03-03 07:00:00,Run,3000.0,900",
      ]);
      await warehouse.upsertCsvFiles(tempDir);

      const rows = await warehouse.readActivities();
      expect(rows.map((r) => [r.id, r.name])).toEqual([
        [1, "New"],
        [3, "Fresh"],
      ]);
    });

    it("should leave the table unchanged when the same file is merged twice", async () => {
      writeCsv("activities_2024.csv", [
        "1,Morning Run with Alex,2024-03-01 07:00:00,Workout,5000.0,1800",
        "2,Evening Ride,2024-03-01 18:00:00,Ride,10000.0,2400",
      ]);

      await warehouse.upsertCsvFiles(tempDir);
      const first = await warehouse.readActivities();
      await warehouse.upsertCsvFiles(tempDir);

      expect(await warehouse.readActivities()).toEqual(first);
      expect(await warehouse.countActivities()).toBe(2);
    });

    it("should load files in file name order so the last one wins", async () => {
      writeCsv("activities_last_7_days.csv", ["1,Latest,2024-03-01 07:00:00,Run,5000.0,1800"]);
      writeCsv("activities_2023.csv", ["1,From 2023,2023-03-01 07:00:00,Run,5000.0,1800"]);

      const loaded = await warehouse.upsertCsvFiles(tempDir);

      expect(loaded).toEqual(["activities_2023.csv", "activities_last_7_days.csv"]);
      const [row] = await warehouse.readActivities();
      expect(row.name).toBe("Latest");
    });

    it("should ignore files that are not CSV and nested directories", async () => {
      writeCsv("activities_2024.csv", ["1,Run,2024-03-01 07:00:00,Run,5000.0,1800"]);
      fs.writeFileSync(path.join(tempDir, "activities_2024-raw.json"), "[]");
      fs.writeFileSync(path.join(tempDir, "notes.txt"), "not data");
      fs.mkdirSync(path.join(tempDir, "archive.csv"));

      const loaded = await warehouse.upsertCsvFiles(tempDir);

      expect(loaded).toEqual(["activities_2024.csv"]);
    });

    it("should skip a file that only has a header", async () => {
      writeCsv("activities_last_7_days.csv", []);

      const loaded = await warehouse.upsertCsvFiles(tempDir);

      expect(loaded).toEqual(["activities_last_7_days.csv"]);
      expect(await warehouse.countActivities()).toBe(0);
      expect(warnSpy).toHaveBeenCalledWith("⚠️  activities_last_7_days.csv has no rows, skipping merge");
    });

    it("should abort the remaining files when one fails", async () => {
      fs.writeFileSync(path.join(tempDir, "a_unrelated.csv"), "foo,bar\n1,2\n");
      writeCsv("b_activities.csv", ["1,Run,2024-03-01 07:00:00,Run,5000.0,1800"]);

      await expect(warehouse.upsertCsvFiles(tempDir)).rejects.toThrow();
      expect(await warehouse.countActivities()).toBe(0);
    });

    it("should return an empty list for a directory without CSV files", async () => {
      await expect(warehouse.upsertCsvFiles(tempDir)).resolves.toEqual([]);
    });
  });
});

describe("isMotherDuck", () => {
  it("should recognise md: locations", () => {
    expect(isMotherDuck("md:")).toBe(true);
    expect(isMotherDuck("md:strava")).toBe(true);
    expect(isMotherDuck(":memory:")).toBe(false);
    expect(isMotherDuck("/data/warehouse.duckdb")).toBe(false);
  });
});
