import type { LoaderFunctionArgs } from "@remix-run/node";
import { json } from "@remix-run/node";
import { useLoaderData } from "@remix-run/react";

import BarMeter from "~/components/bar-meter";
import DataTable from "~/components/data-table";
import type { DataColumn } from "~/components/data-table";
import MetricSection from "~/components/metric-section";
import ReportShell, { ReportError } from "~/components/report-shell";
import type { CategoryComparison, ReportYears } from "~/types/metrics";
import { formatChange, formatMonth, formatNumber } from "~/utils/format";
import { loadReportData } from "~/utils/report.server";

const TITLE = "Resolution Analysis";

export async function loader({ request }: LoaderFunctionArgs) {
  const data = await loadReportData(request);
  return json(data, { status: data.ok ? 200 : 500 });
}

function severityColumns(years: ReportYears): DataColumn<CategoryComparison>[] {
  const valueFor = (entry: CategoryComparison, which: "previous" | "current") =>
    entry.comparison.status === "available" ? formatNumber(entry.comparison.value[which], 1) : "N/A";

  return [
    { key: "severity", label: "Severity", render: (entry) => entry.category },
    { key: "previous", label: String(years.previous), numeric: true, render: (entry) => valueFor(entry, "previous") },
    { key: "current", label: String(years.current), numeric: true, render: (entry) => valueFor(entry, "current") },
    {
      key: "change",
      label: "Change",
      numeric: true,
      render: (entry) =>
        entry.comparison.status === "available" ? formatChange(entry.comparison.value.change) : "N/A"
    }
  ];
}

export default function ResolutionAnalysisRoute() {
  const data = useLoaderData<typeof loader>();

  if (!data.ok) {
    return <ReportError title={TITLE} error={data.error} />;
  }

  const { catalog, generatedAt, issues } = data.report;
  const { metrics, years } = catalog;

  return (
    <ReportShell
      title={TITLE}
      description="Resolution and first response times by severity, and the monthly backlog."
      generatedAt={generatedAt}
      issues={issues}
    >
      <div className="panels-grid">
        <MetricSection title="Resolution Times by Severity (days)" metric={metrics.resolutionBySeverity}>
          {(entries) => (
            <DataTable
              title="Resolution Times by Severity (days)"
              rows={entries}
              rowKey={(entry) => entry.category}
              exportTable="resolution"
              columns={severityColumns(years)}
            />
          )}
        </MetricSection>

        <MetricSection title="First Response by Severity (hours)" metric={metrics.firstResponseBySeverity}>
          {(entries) => (
            <DataTable
              title="First Response by Severity (hours)"
              rows={entries}
              rowKey={(entry) => entry.category}
              exportTable="first-response"
              columns={severityColumns(years)}
            />
          )}
        </MetricSection>
      </div>

      <MetricSection title="Cumulative Backlog" metric={metrics.backlog}>
        {(series) => {
          const rows = series.flatMap(({ year, points }) => points.map((point) => ({ year, ...point })));
          const maxBacklog = Math.max(...rows.map((row) => Math.abs(row.backlog)), 1);
          return (
            <DataTable
              title="Cumulative Backlog"
              rows={rows}
              rowKey={(row) => `${row.year}-${row.monthIndex}`}
              exportTable="backlog"
              columns={[
                { key: "month", label: "Month", render: (row) => formatMonth(row.year, row.monthIndex) },
                { key: "created", label: "Created", numeric: true, render: (row) => formatNumber(row.created) },
                { key: "resolved", label: "Resolved", numeric: true, render: (row) => formatNumber(row.resolved) },
                {
                  key: "net",
                  label: "Net",
                  numeric: true,
                  render: (row) => (row.net > 0 ? `+${formatNumber(row.net)}` : formatNumber(row.net))
                },
                {
                  key: "backlog",
                  label: "Backlog",
                  render: (row) => (
                    <BarMeter value={Math.abs(row.backlog)} max={maxBacklog} label={formatNumber(row.backlog)} />
                  )
                }
              ]}
            />
          );
        }}
      </MetricSection>
    </ReportShell>
  );
}
