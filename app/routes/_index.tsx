import type { LoaderFunctionArgs } from "@remix-run/node";
import { json } from "@remix-run/node";
import { useLoaderData } from "@remix-run/react";

import DataTable from "~/components/data-table";
import MetricCard from "~/components/metric-card";
import type { MetricAccent } from "~/components/metric-card";
import MetricSection from "~/components/metric-section";
import ReportShell, { ReportError } from "~/components/report-shell";
import type { Metric, YearComparison } from "~/types/metrics";
import { formatChange, formatNumber, formatPercent, formatSummaryValue, trendLabel } from "~/utils/format";
import { loadReportData } from "~/utils/report.server";

const TITLE = "Executive Summary";

// Every headline metric is "lower is better"; growth past the danger line turns red.
const CHANGE_THRESHOLDS = { warning: 0, danger: 10 } as const;

function getChangeAccent(change: Metric<number>): MetricAccent {
  if (change.status === "unavailable") {
    return "neutral";
  }
  if (change.value > CHANGE_THRESHOLDS.danger) return "danger";
  if (change.value > CHANGE_THRESHOLDS.warning) return "warning";
  return "success";
}

function comparisonCard(
  label: string,
  metric: Metric<YearComparison>,
  formatValue: (value: number) => string,
  helper?: string
) {
  if (metric.status === "unavailable") {
    return <MetricCard key={label} label={label} value={null} helper={helper} />;
  }
  const { current, change, changeUnit } = metric.value;
  return (
    <MetricCard
      key={label}
      label={label}
      value={formatValue(current)}
      delta={formatChange(change, changeUnit)}
      accent={getChangeAccent(change)}
      helper={helper}
    />
  );
}

export async function loader({ request }: LoaderFunctionArgs) {
  const data = await loadReportData(request);
  return json(data, { status: data.ok ? 200 : 500 });
}

export default function ExecutiveSummaryRoute() {
  const data = useLoaderData<typeof loader>();

  if (!data.ok) {
    return <ReportError title={TITLE} error={data.error} />;
  }

  const { catalog, generatedAt, issues } = data.report;
  const { metrics, years } = catalog;

  return (
    <ReportShell
      title={TITLE}
      description={`Support performance for ${years.current} compared with ${years.previous}.`}
      generatedAt={generatedAt}
      issues={issues}
    >
      <section className="metrics-grid">
        {comparisonCard(`Total Tickets (${years.current})`, metrics.totalTickets, (value) => formatNumber(value))}
        {comparisonCard("Engineering Involvement", metrics.engineeringInvolvement, (value) => formatPercent(value))}
        {comparisonCard("Avg First Response (hrs)", metrics.avgFirstResponseHours, (value) => formatNumber(value))}
        {comparisonCard("Avg Resolution (days)", metrics.avgResolutionDays, (value) => formatNumber(value))}
      </section>

      <MetricSection title="Resolution Time by Severity" metric={metrics.resolutionBySeverity}>
        {(severities) => (
          <section className="tickets-panel">
            <h2>Resolution Time by Severity</h2>
            <div className="metrics-grid">
              {severities.map((entry) =>
                comparisonCard(`${entry.category} (days)`, entry.comparison, (value) => formatNumber(value))
              )}
            </div>
          </section>
        )}
      </MetricSection>

      <MetricSection title="Year-over-Year Comparison" metric={metrics.yearOverYearSummary}>
        {(rows) => (
          <DataTable
            title="Year-over-Year Comparison"
            rows={rows}
            rowKey={(row) => row.label}
            exportTable="yoy-summary"
            columns={[
              { key: "metric", label: "Metric", render: (row) => row.label },
              {
                key: "previous",
                label: String(years.previous),
                numeric: true,
                render: (row) => formatSummaryValue(row, "previous")
              },
              {
                key: "current",
                label: String(years.current),
                numeric: true,
                render: (row) => formatSummaryValue(row, "current")
              },
              {
                key: "change",
                label: "Change",
                numeric: true,
                render: (row) => formatChange(row.change, row.changeUnit)
              },
              {
                key: "trend",
                label: "Trend",
                render: (row) => <span className="status-pill" data-variant={row.trend}>{trendLabel(row.trend)}</span>
              }
            ]}
          />
        )}
      </MetricSection>
    </ReportShell>
  );
}
