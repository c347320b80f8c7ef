#!/usr/bin/env node
import path from "path";
import { ALL, FilterCriteria, FilterOptions } from "../../core/entities";
import { LoadError } from "../../core/errors";
import { CsvDatasetLoader, loadEventsFromCsv } from "../../data/csv/CsvEventLoader";
import { DatasetLoader } from "../../data/DatasetLoader";
import { DatasetStore } from "../../data/DatasetStore";
import {
  DEFAULT_DASHBOARD_CONFIG,
  DashboardConfig,
  DashboardSnapshot,
  createDashboard,
} from "../../services/DashboardService";
import { initializeDatabase } from "../../storage/Database";
import { SqliteDatasetLoader, createEventRepository } from "../../storage/EventRepository";
import { isValidDate, today } from "../../utils/time";

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export interface CliArgs {
  events?: string;
  db?: string;
  importTo?: string;
  start?: string;
  end?: string;
  platform: string;
  userType: string;
  column?: string;
  topN?: number;
  format: "table" | "json";
  help: boolean;
}

function takeValue(argv: string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined || value.startsWith("--")) {
    throw new CliUsageError(`Missing value for ${flag}`);
  }
  return value;
}

function parseDate(value: string, flag: string): string {
  if (!isValidDate(value)) {
    throw new CliUsageError(`Invalid date for ${flag} (expected YYYY-MM-DD): ${value}`);
  }
  return value;
}

export function parseArgs(
  argv: string[],
  config: Pick<DashboardConfig, "minTopN" | "maxTopN"> = DEFAULT_DASHBOARD_CONFIG
): CliArgs {
  const args: CliArgs = {
    platform: ALL,
    userType: ALL,
    format: "table",
    help: false,
  };

  for (let i = 2; i < argv.length; i++) {
    const flag = argv[i];
    switch (flag) {
      case "--events":
        args.events = takeValue(argv, ++i, flag);
        break;
      case "--db":
        args.db = takeValue(argv, ++i, flag);
        break;
      case "--import-to":
        args.importTo = takeValue(argv, ++i, flag);
        break;
      case "--start":
        args.start = parseDate(takeValue(argv, ++i, flag), flag);
        break;
      case "--end":
        args.end = parseDate(takeValue(argv, ++i, flag), flag);
        break;
      case "--platform":
        args.platform = takeValue(argv, ++i, flag);
        break;
      case "--user-type":
        args.userType = takeValue(argv, ++i, flag);
        break;
      case "--column":
        args.column = takeValue(argv, ++i, flag);
        break;
      case "--top-n": {
        const raw = takeValue(argv, ++i, flag);
        const topN = Number(raw);
        if (!Number.isInteger(topN) || topN < config.minTopN || topN > config.maxTopN) {
          throw new CliUsageError(
            `--top-n must be an integer between ${config.minTopN} and ${config.maxTopN}: ${raw}`
          );
        }
        args.topN = topN;
        break;
      }
      case "--format": {
        const format = takeValue(argv, ++i, flag);
        if (format !== "table" && format !== "json") {
          throw new CliUsageError(`Unknown format: ${format}`);
        }
        args.format = format;
        break;
      }
      case "--help":
        args.help = true;
        return args;
      default:
        throw new CliUsageError(`Unknown argument: ${flag}`);
    }
  }

  if (!args.events && !args.db) {
    throw new CliUsageError("Either --events or --db is required.");
  }
  if (args.events && args.db) {
    throw new CliUsageError("Use only one of --events and --db.");
  }
  if (args.importTo && !args.events) {
    throw new CliUsageError("--import-to requires --events.");
  }

  return args;
}

function printUsage(): void {
  console.log(`
Usage: ott-dashboard [options]

Source (one required):
  --events <path>        Path to clickstream CSV file
  --db <path>            Path to an event store created with --import-to

Optional:
  --import-to <path>     Copy the CSV events into a SQLite event store and report from it
  --start <YYYY-MM-DD>   First day to include (default: earliest event)
  --end <YYYY-MM-DD>     Last day to include (default: latest event)
  --platform <name>      Only this platform (default: All)
  --user-type <name>     Only this user type (default: All)
  --column <name>        Column for the distribution table (default: first device column)
  --top-n <n>            Rows in the distribution table, 5-50 (default: 20)
  --format <table|json>  Output format (default: table)
  --help                 Show this help message
`);
}

export function buildCriteria(args: CliArgs, options: FilterOptions): FilterCriteria {
  return {
    startDate: args.start ?? options.minDate ?? today(),
    endDate: args.end ?? options.maxDate ?? today(),
    platform: args.platform,
    userType: args.userType,
  };
}

function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

export function formatTableOutput(snapshot: DashboardSnapshot): string[] {
  const line = "=".repeat(56);
  const divider = "-".repeat(56);
  const { criteria, views } = snapshot;
  const out: string[] = [];

  out.push(line);
  out.push(" OTT Subscription & Device Dashboard");
  out.push(line);
  out.push(`  Dates:     ${criteria.startDate} .. ${criteria.endDate}`);
  out.push(`  Platform:  ${criteria.platform}`);
  out.push(`  User type: ${criteria.userType}`);
  out.push(`  Events:    ${snapshot.filteredCount} of ${snapshot.totalCount}`);

  if (views.funnelCounts) {
    out.push(divider, "FUNNEL STEPS");
    for (const row of views.funnelCounts) {
      out.push(`  ${row.value.padEnd(44)} ${row.count}`);
    }
  }

  if (views.funnelFlow) {
    out.push(divider, "FUNNEL FLOW");
    for (const edge of views.funnelFlow.edges) {
      out.push(`  ${edge.source} -> ${edge.target}`);
      out.push(`     ${edge.volume} users, conversion ${formatPercent(edge.conversionPercent)}`);
    }
  }

  if (views.dailyTrend) {
    out.push(divider, "DAILY EVENTS");
    for (const row of views.dailyTrend) {
      out.push(`  ${row.date}  ${row.count}`);
    }
  }

  if (views.campaignConversions) {
    out.push(divider, "CAMPAIGN CONVERSIONS");
    for (const row of views.campaignConversions) {
      out.push(`  ${row.value.padEnd(44)} ${row.count}`);
    }
  }

  if (views.osDistribution) {
    out.push(divider, "OS DISTRIBUTION");
    for (const row of views.osDistribution) {
      out.push(`  ${row.value.padEnd(44)} ${row.count}`);
    }
  }

  if (views.paymentBreakdown) {
    out.push(divider, "PAYMENT METHOD / STATUS");
    for (const row of views.paymentBreakdown) {
      out.push(`  ${`${row.first} / ${row.second}`.padEnd(44)} ${row.count}`);
    }
  }

  if (views.packPopularity) {
    out.push(divider, "SUBSCRIPTION PACKS");
    for (const row of views.packPopularity) {
      const mean = row.mean === null ? "-" : row.mean.toFixed(2);
      out.push(`  ${row.value.padEnd(32)} ${String(row.count).padStart(6)}  avg ${mean}`);
    }
  }

  if (views.columnDistribution && snapshot.params.selectedColumn) {
    out.push(divider, `TOP ${snapshot.params.topN} ${snapshot.params.selectedColumn}`);
    for (const row of views.columnDistribution) {
      out.push(`  ${row.value.padEnd(44)} ${row.count}`);
    }
  }

  if (snapshot.skipped.length > 0) {
    out.push(divider, "SKIPPED VIEWS");
    for (const view of snapshot.skipped) {
      const reason =
        view.missingColumns.length > 0 ? `missing ${view.missingColumns.join(", ")}` : "no column selected";
      out.push(`  ${view.id}: ${reason}`);
    }
  }

  out.push(line);
  return out;
}

function createLoader(args: CliArgs): DatasetLoader {
  const dbPath = args.db ?? args.importTo;
  if (dbPath) return new SqliteDatasetLoader(path.resolve(dbPath));
  return new CsvDatasetLoader(path.resolve(args.events ?? ""));
}

function importEvents(eventsPath: string, dbPath: string): void {
  const dataset = loadEventsFromCsv(eventsPath);
  const db = initializeDatabase(dbPath);
  try {
    const repo = createEventRepository(db);
    repo.replaceAll(dataset);
    console.log(`Imported ${repo.count()} events into ${dbPath}`);
  } finally {
    db.close();
  }
}

export function main(argv: string[] = process.argv): number {
  try {
    const args = parseArgs(argv);
    if (args.help) {
      printUsage();
      return 0;
    }

    if (args.importTo && args.events) {
      importEvents(path.resolve(args.events), path.resolve(args.importTo));
    }

    const dashboard = createDashboard(new DatasetStore(createLoader(args)));
    const criteria = buildCriteria(args, dashboard.filterOptions());
    const snapshot = dashboard.refresh(criteria, {
      ...(args.column !== undefined && { selectedColumn: args.column }),
      ...(args.topN !== undefined && { topN: args.topN }),
    });

    if (args.format === "json") {
      console.log(JSON.stringify(snapshot, null, 2));
    } else {
      console.log(formatTableOutput(snapshot).join("\n"));
    }
    return 0;
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(`Error: ${err.message}`);
      printUsage();
    } else if (err instanceof LoadError) {
      console.error(`Load failed: ${err.message}`);
    } else {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    }
    return 2;
  }
}

if (require.main === module) {
  process.exit(main());
}
