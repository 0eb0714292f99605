import * as fs from "fs";
import * as path from "path";
import { DuckDBConnection, DuckDBInstance } from "@duckdb/node-api";
import { WarehouseConfig } from "./shared/config";
import { ActivityViewRow } from "./shared/types";

// "<workout type> with <coach>"
const NAME_PATTERN = "^(.*)\\s+with\\s+(.+)$";

const CREATE_RAW_TABLE = `
  create table if not exists activities_raw (
    id bigint primary key,
    name varchar,
    start_date_local timestamp,
    type varchar,
    distance double,
    moving_time int
  );
`;

// Distance and time use integer division before rounding, so 1830 s is 30 min
const CREATE_ACTIVITIES_VIEW = `
  create or replace view activities as select
    id,
    name,
    start_date_local as start_date,
    type,
    case when type = 'Workout'
      then nullif(regexp_extract(name, '${NAME_PATTERN}', 1), '')
      end as workout_type,
    case when type in ('Workout', 'VirtualRide')
      then nullif(regexp_extract(name, '${NAME_PATTERN}', 2), '')
      end as coach,
    round(distance // 1000, 1) as distance_km,
    round(moving_time // 60, 1) as moving_time_min
  from activities_raw;
`;

const MERGE_STAGING = `
  merge into activities_raw
  using (select * from activities_staging) as upserts
  on (upserts.id = activities_raw.id)
  when matched then update
  when not matched then insert;
`;

const quoteLiteral = (value: string): string => `'${value.replace(/'/g, "''")}'`;
const quoteIdentifier = (value: string): string => `"${value.replace(/"/g, '""')}"`;

const toNumber = (value: unknown): number | null => {
  if (typeof value === "number") return value;
  if (typeof value === "bigint") return Number(value);
  return null;
};

const toText = (value: unknown): string | null => (typeof value === "string" ? value : null);

export const isMotherDuck = (location: string): boolean => location.startsWith("md:");

/**
 * DuckDB / MotherDuck warehouse holding the merged activity history
 */
export class Warehouse {
  private config: WarehouseConfig;
  private instance: DuckDBInstance | null = null;
  private connection: DuckDBConnection | null = null;
  private ready = false;

  constructor(config: WarehouseConfig) {
    this.config = config;
  }

  private async connect(): Promise<DuckDBConnection> {
    if (this.connection) {
      return this.connection;
    }

    let instance: DuckDBInstance;
    if (isMotherDuck(this.config.location)) {
      console.log("🦆 Connecting to MotherDuck...");
      const options: Record<string, string> = {};
      if (this.config.motherduckToken) {
        options.motherduck_token = this.config.motherduckToken;
      }
      instance = await DuckDBInstance.create("md:", options);
    } else {
      console.log(`🦆 Opening local DuckDB (${this.config.location})...`);
      instance = await DuckDBInstance.create(":memory:");
    }

    this.instance = instance;
    this.connection = await instance.connect();
    return this.connection;
  }

  private requireReady(): DuckDBConnection {
    if (!this.connection || !this.ready) {
      throw new Error("Warehouse is not set up; call setup() first");
    }
    return this.connection;
  }

  /**
   * Create the database and base table if missing, and (re)create the view
   */
  async setup(): Promise<void> {
    const connection = await this.connect();
    const database = quoteIdentifier(this.config.database);

    if (isMotherDuck(this.config.location)) {
      await connection.run(`create database if not exists ${database};`);
    } else {
      await connection.run(
        `attach if not exists ${quoteLiteral(this.config.location)} as ${database};`
      );
    }
    await connection.run(`use ${database};`);
    await connection.run(CREATE_RAW_TABLE);
    await connection.run(CREATE_ACTIVITIES_VIEW);

    this.ready = true;
    console.log(`✅ Warehouse ready (database: ${this.config.database})`);
  }

  /**
   * Merge every CSV file directly inside `dir` into activities_raw, in file
   * name order. The first failing file aborts the rest of the batch.
   */
  async upsertCsvFiles(dir: string): Promise<string[]> {
    const connection = this.requireReady();

    const csvFiles = fs
      .readdirSync(dir, { withFileTypes: true })
      .filter((entry) => entry.isFile() && entry.name.endsWith(".csv"))
      .map((entry) => entry.name)
      .sort();

    const loaded: string[] = [];
    for (const fileName of csvFiles) {
      const csvPath = path.join(dir, fileName);

      // start_date_local is wall-clock time: read it as a plain TIMESTAMP
      await connection.run(`
        create temp table activities_staging as
        select * from read_csv_auto(
          ${quoteLiteral(csvPath)},
          header = true,
          types = {'start_date_local': 'TIMESTAMP'}
        );
      `);

      const reader = await connection.runAndReadAll(
        "select count(*) as row_count from activities_staging;"
      );
      const rowCount = toNumber(reader.getRowObjectsJS()[0]?.row_count) ?? 0;

      if (rowCount === 0) {
        console.warn(`⚠️  ${fileName} has no rows, skipping merge`);
      } else {
        await connection.run(MERGE_STAGING);
      }

      await connection.run("drop table activities_staging;");
      console.log(`🦆 Uploaded ${fileName} to DuckDB (${rowCount} rows)`);
      loaded.push(fileName);
    }

    return loaded;
  }

  async countActivities(): Promise<number> {
    const connection = this.requireReady();
    const reader = await connection.runAndReadAll(
      "select count(*) as row_count from activities_raw;"
    );
    return toNumber(reader.getRowObjectsJS()[0]?.row_count) ?? 0;
  }

  /**
   * Read the derived `activities` view, ordered by id
   */
  async readActivities(): Promise<ActivityViewRow[]> {
    const connection = this.requireReady();
    const reader = await connection.runAndReadAll(`
      select
        id,
        name,
        strftime(start_date, '%Y-%m-%d %H:%M:%S') as start_date,
        type,
        workout_type,
        coach,
        distance_km,
        moving_time_min
      from activities
      order by id;
    `);

    return reader.getRowObjectsJS().map((row) => ({
      id: toNumber(row.id) ?? 0,
      name: toText(row.name),
      startDate: toText(row.start_date),
      type: toText(row.type),
      workoutType: toText(row.workout_type),
      coach: toText(row.coach),
      distanceKm: toNumber(row.distance_km),
      movingTimeMin: toNumber(row.moving_time_min),
    }));
  }

  close(): void {
    if (this.connection) {
      this.connection.closeSync();
      this.connection = null;
    }
    if (this.instance) {
      this.instance.closeSync();
      this.instance = null;
    }
    this.ready = false;
  }
}

export default Warehouse;
