import type { HistogramView, PlotView, StatsView, TimeseriesView, View } from "./schema";

export type TableCell = number | string | null;

const MAX_FRACTION_DIGITS = 6;

export function formatCell(value: TableCell): string {
  if (value === null) {
    return "";
  }
  if (typeof value === "string") {
    return value;
  }
  if (Number.isInteger(value) || !Number.isFinite(value)) {
    return String(value);
  }
  return String(Number(value.toFixed(MAX_FRACTION_DIGITS)));
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, "\\|");
}

/** Markdown pipe table, every column padded to its widest cell. */
export function renderMarkdownTable(header: readonly string[], rows: readonly TableCell[][]): string {
  const cells = [
    header.map(escapeCell),
    ...rows.map((row) => header.map((_, index) => escapeCell(formatCell(row[index] ?? null)))),
  ];
  const widths = header.map((_, column) =>
    Math.max(3, ...cells.map((row) => row[column].length)),
  );
  const renderRow = (row: string[]) =>
    `| ${row.map((cell, column) => cell.padEnd(widths[column])).join(" | ")} |`;
  const separator = `|${widths.map((width) => "-".repeat(width + 2)).join("|")}|`;
  return [renderRow(cells[0]), separator, ...cells.slice(1).map(renderRow)].join("\n");
}

const STATS_COLUMNS = ["source", "key", "number", "min", "max", "mean", "median", "stdev", "q95"] as const;

function renderStats(view: StatsView): string {
  return renderMarkdownTable(
    STATS_COLUMNS,
    view.rows.map((row) => STATS_COLUMNS.map((column) => row[column])),
  );
}

function renderTimeseries(view: TimeseriesView): string {
  const length = view.lines.reduce((longest, line) => Math.max(longest, line.x.length), 0);
  const rows = Array.from({ length }, (_, frame) => [
    frame,
    ...view.lines.map((line) => line.y[frame] ?? null),
  ]);
  return renderMarkdownTable(["frame", ...view.lines.map((line) => line.label)], rows);
}

function renderHistogram(view: HistogramView): string {
  const rows = view.edges.slice(0, -1).map((edge, bin) => [
    edge,
    view.edges[bin + 1],
    ...view.histograms.map((histogram) => histogram.counts[bin]),
  ]);
  return renderMarkdownTable(
    ["from", "to", ...view.histograms.map((histogram) => histogram.label)],
    rows,
  );
}

function renderPlot(view: PlotView): string {
  return view.lines
    .map((line) =>
      [
        line.label,
        "",
        renderMarkdownTable(
          [line.xKey, `${line.aggregation}(${line.yKey})`],
          line.x.map((x, index) => [x, line.y[index]]),
        ),
      ].join("\n"),
    )
    .join("\n\n");
}

export function renderView(view: View): string {
  switch (view.kind) {
    case "timeseries":
    case "cumulative_timeseries":
      return renderTimeseries(view);
    case "hist":
    case "hist_ratio":
    case "stdev_hist":
      return renderHistogram(view);
    case "plot":
      return renderPlot(view);
    case "stats":
      return renderStats(view);
  }
}

export function renderViews(views: readonly View[]): string {
  return views.map((view) => `## ${view.kind}\n\n${renderView(view)}`).join("\n\n");
}
