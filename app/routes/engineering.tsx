import type { LoaderFunctionArgs } from "@remix-run/node";
import { json } from "@remix-run/node";
import { useLoaderData } from "@remix-run/react";

import BarMeter from "~/components/bar-meter";
import DataTable from "~/components/data-table";
import MetricSection from "~/components/metric-section";
import ReportShell, { ReportError } from "~/components/report-shell";
import { formatChange, formatMeasured, formatNumber } from "~/utils/format";
import { loadReportData } from "~/utils/report.server";

const TITLE = "Engineering Analysis";

export async function loader({ request }: LoaderFunctionArgs) {
  const data = await loadReportData(request);
  return json(data, { status: data.ok ? 200 : 500 });
}

export default function EngineeringAnalysisRoute() {
  const data = useLoaderData<typeof loader>();

  if (!data.ok) {
    return <ReportError title={TITLE} error={data.error} />;
  }

  const { catalog, generatedAt, issues } = data.report;
  const { metrics, years } = catalog;

  return (
    <ReportShell
      title={TITLE}
      description="How often tickets escalate to engineering, and to which teams."
      generatedAt={generatedAt}
      issues={issues}
    >
      <MetricSection title="Engineering Involvement Summary" metric={metrics.engineeringSummary}>
        {(entries) => (
          <DataTable
            title="Engineering Involvement Summary"
            rows={entries}
            rowKey={(entry) => entry.metric}
            exportTable="engineering-summary"
            columns={[
              { key: "metric", label: "Metric", render: (entry) => entry.metric },
              {
                key: "previous",
                label: String(years.previous),
                numeric: true,
                render: (entry) => formatMeasured(entry.previous)
              },
              {
                key: "current",
                label: String(years.current),
                numeric: true,
                render: (entry) => formatMeasured(entry.current)
              },
              {
                key: "change",
                label: "Change",
                numeric: true,
                render: (entry) => formatChange(entry.change, entry.changeUnit)
              }
            ]}
          />
        )}
      </MetricSection>

      <MetricSection title="Escalations by Engineering Team" metric={metrics.engineeringTeams}>
        {(entries) => {
          const maxTickets = Math.max(...entries.map(({ item }) => item.currentTickets), 1);
          return (
            <DataTable
              title="Escalations by Engineering Team"
              rows={entries}
              rowKey={({ item }) => item.team}
              exportTable="engineering-teams"
              columns={[
                { key: "rank", label: "#", render: ({ rank }) => rank },
                { key: "team", label: "Team", render: ({ item }) => item.team },
                {
                  key: "previous",
                  label: String(years.previous),
                  numeric: true,
                  render: ({ item }) => formatNumber(item.previousTickets)
                },
                {
                  key: "current",
                  label: String(years.current),
                  render: ({ item }) => (
                    <BarMeter value={item.currentTickets} max={maxTickets} label={formatNumber(item.currentTickets)} />
                  )
                },
                {
                  key: "change",
                  label: "Change",
                  numeric: true,
                  render: ({ item }) =>
                    item.change.status === "available" ? formatChange(item.change) : formatMeasured(item.reportedChange)
                }
              ]}
            />
          );
        }}
      </MetricSection>
    </ReportShell>
  );
}
