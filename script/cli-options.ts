import { z } from "zod";
import { frameRangeSchema, viewRequestSchema, type ViewRequest } from "@shared/schema";
import { FrameStatsError } from "@shared/errors";

export class CliUsageError extends FrameStatsError {}

export const cliOptionsSchema = viewRequestSchema.merge(frameRangeSchema).extend({
  printKeys: z.boolean().default(false),
  json: z.boolean().default(false),
  serve: z.boolean().default(false),
  help: z.boolean().default(false),
  paths: z.array(z.string().min(1)).default([]),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

type FlagField = "printKeys" | "json" | "serve" | "help" | "timeseriesSum" | "cumulativeTimeseriesSum" | "statsSum";

const FLAGS: Record<string, FlagField> = {
  "--print_keys": "printKeys",
  "--json": "json",
  "--serve": "serve",
  "--help": "help",
  "-h": "help",
  "--timeseries_sum": "timeseriesSum",
  "--commulative_timeseries_sum": "cumulativeTimeseriesSum",
  "--cumulative_timeseries_sum": "cumulativeTimeseriesSum",
  "--stats_sum": "statsSum",
};

type ListField = "timeseries" | "cumulativeTimeseries" | "hist" | "stats";

const LIST_OPTIONS: Record<string, ListField> = {
  "--timeseries": "timeseries",
  "--commulative_timeseries": "cumulativeTimeseries",
  "--cumulative_timeseries": "cumulativeTimeseries",
  "--hist": "hist",
  "--stats": "stats",
};

export const USAGE = `Usage: frame-stats [options] [path...]

Reads stats viewer logs (stdin when no path is given) and prints the
requested views.

Options:
  --print_keys                        print every metric key found
  --timeseries <key>                  time series of a metric (repeatable)
  --commulative_timeseries <key>      cumulative time series (repeatable)
  --hist <key>                        histogram of a metric (repeatable)
  --hist_ratio <first> <second>       histogram of first / second (repeatable)
  --stdev_hist <key> <scale>          histogram around the median, scale stdevs wide
  --plot <x> <y> <mean|median>        y aggregated per distinct x (repeatable)
  --stats <key>                       summary statistics table (repeatable)
  --timeseries_sum                    add a per-frame sum to the time series
  --commulative_timeseries_sum        add a per-frame sum to the cumulative series
  --stats_sum                         add a sum row per source to the stats table
  --begin_frame <n>                   first frame to process (default 0)
  --end_frame <n>                     frame to stop before (default: all)
  --json                              print views as JSON instead of tables
  --serve                             serve keys, frames and views over HTTP
  -h, --help                          show this message
`;

function parseInteger(option: string, value: string): number {
  if (!/^[+-]?\d+$/.test(value.trim())) {
    throw new CliUsageError(`Invalid ${option} value: ${value}`);
  }
  return Number.parseInt(value, 10);
}

function parseNumber(option: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new CliUsageError(`Invalid ${option} value: ${value}`);
  }
  return parsed;
}

type RawCliOptions = Record<ListField, string[]> &
  Record<FlagField, boolean> & {
    histRatio: Array<[string, string]>;
    stdevHist: Array<[string, number]>;
    plot: Array<[string, string, string]>;
    paths: string[];
    beginFrame?: number;
    endFrame?: number;
  };

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const raw: RawCliOptions = {
    timeseries: [],
    cumulativeTimeseries: [],
    hist: [],
    stats: [],
    histRatio: [],
    stdevHist: [],
    plot: [],
    paths: [],
    printKeys: false,
    json: false,
    serve: false,
    help: false,
    timeseriesSum: false,
    cumulativeTimeseriesSum: false,
    statsSum: false,
  };

  let onlyPaths = false;
  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (onlyPaths || !token.startsWith("-")) {
      raw.paths.push(token);
      continue;
    }
    if (token === "--") {
      onlyPaths = true;
      continue;
    }

    const equalsAt = token.indexOf("=");
    const arg = equalsAt > 0 ? token.slice(0, equalsAt) : token;
    const inlineValue = equalsAt > 0 ? token.slice(equalsAt + 1) : undefined;

    const take = (count: number): string[] => {
      if (inlineValue !== undefined) {
        if (count !== 1) {
          throw new CliUsageError(`${arg} takes ${count} values and cannot use ${arg}=value`);
        }
        return [inlineValue];
      }
      const values = argv.slice(i + 1, i + 1 + count);
      if (values.length < count) {
        throw new CliUsageError(`${arg} requires ${count} value${count === 1 ? "" : "s"}`);
      }
      i += count;
      return values;
    };

    const flag = FLAGS[arg];
    if (flag) {
      if (inlineValue !== undefined) {
        throw new CliUsageError(`${arg} does not take a value`);
      }
      raw[flag] = true;
      continue;
    }

    const list = LIST_OPTIONS[arg];
    if (list) {
      raw[list].push(take(1)[0]);
      continue;
    }

    switch (arg) {
      case "--hist_ratio": {
        const [first, second] = take(2);
        raw.histRatio.push([first, second]);
        break;
      }
      case "--stdev_hist": {
        const [key, scale] = take(2);
        raw.stdevHist.push([key, parseNumber(arg, scale)]);
        break;
      }
      case "--plot": {
        const [x, y, aggregation] = take(3);
        raw.plot.push([x, y, aggregation]);
        break;
      }
      case "--begin_frame": {
        raw.beginFrame = parseInteger(arg, take(1)[0]);
        break;
      }
      case "--end_frame": {
        raw.endFrame = parseInteger(arg, take(1)[0]);
        break;
      }
      default: {
        throw new CliUsageError(`Unknown option: ${arg}`);
      }
    }
  }

  const parsed = cliOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new CliUsageError(
      `Invalid options: ${issue.path.length > 0 ? `${issue.path.join(".")}: ` : ""}${issue.message}`,
    );
  }
  return parsed.data;
}

export function toViewRequest(options: CliOptions): ViewRequest {
  return {
    timeseries: options.timeseries,
    timeseriesSum: options.timeseriesSum,
    cumulativeTimeseries: options.cumulativeTimeseries,
    cumulativeTimeseriesSum: options.cumulativeTimeseriesSum,
    hist: options.hist,
    histRatio: options.histRatio,
    stdevHist: options.stdevHist,
    plot: options.plot,
    stats: options.stats,
    statsSum: options.statsSum,
  };
}
