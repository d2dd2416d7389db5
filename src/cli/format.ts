import type {
  ComparisonReport,
  ComparisonTable,
  InstrumentMetrics,
  ValidationReport,
} from "../types/index.ts";

const fmt = (value: number | null | undefined, suffix = "") =>
  value === null || value === undefined ? "N/A" : `${value.toFixed(2)}${suffix}`;

export function formatComparisonCsv(table: ComparisonTable): string {
  const header = ["date", ...table.columns.map((c) => c.name)].join(",");
  const rows = table.dates.map((date, idx) =>
    [
      date,
      ...table.columns.map((column) => {
        const value = column.values[idx];
        return value === null || value === undefined ? "" : value.toFixed(4);
      }),
    ].join(",")
  );
  return [header, ...rows].join("\n");
}

function metricsRow(name: string, metrics: InstrumentMetrics): string {
  return [
    name.padEnd(16),
    fmt(metrics.totalReturn, "%").padStart(10),
    fmt(metrics.annualizedReturn, "%").padStart(10),
    fmt(metrics.volatility, "%").padStart(10),
    fmt(metrics.sharpeRatio).padStart(8),
    fmt(metrics.maxDrawdown, "%").padStart(10),
    fmt(metrics.beta).padStart(6),
  ].join(" ");
}

export function formatMetricsTable(report: ComparisonReport): string {
  const lines = [
    [
      "Instrument".padEnd(16),
      "Total".padStart(10),
      "Annual".padStart(10),
      "Vol".padStart(10),
      "Sharpe".padStart(8),
      "MaxDD".padStart(10),
      "Beta".padStart(6),
    ].join(" "),
  ];
  for (const instrument of report.instruments) {
    lines.push(metricsRow(instrument.identifier, instrument.metrics));
  }
  return lines.join("\n");
}

export function formatValidation(report: ValidationReport): string[] {
  return Object.entries(report.checks).map(([name, check]) => {
    const mark = check.passed ? "✓" : "✗";
    const warnings = check.warnings?.length
      ? ` (${check.warnings.length} warning(s))`
      : "";
    return `  ${mark} ${name}: ${check.message}${warnings}`;
  });
}

export function formatAge(ms: number): string {
  const hours = ms / (60 * 60 * 1000);
  if (hours < 1) return `${Math.round(ms / 60000)}m`;
  if (hours < 48) return `${Math.round(hours)}h`;
  return `${Math.round(hours / 24)}d`;
}
