import type { LoaderFunctionArgs } from "@remix-run/node";
import { json } from "@remix-run/node";
import { useLoaderData } from "@remix-run/react";

import BarMeter from "~/components/bar-meter";
import DataTable from "~/components/data-table";
import MetricCard from "~/components/metric-card";
import MetricSection from "~/components/metric-section";
import ReportShell, { ReportError } from "~/components/report-shell";
import type { LabelCount } from "~/types/metrics";
import { formatNumber, formatPercent } from "~/utils/format";
import { loadReportData } from "~/utils/report.server";

const TITLE = "Ticket Categories";

export async function loader({ request }: LoaderFunctionArgs) {
  const data = await loadReportData(request);
  return json(data, { status: data.ok ? 200 : 500 });
}

function CountList({ title, entries }: { title: string; entries: LabelCount[] }) {
  const max = Math.max(...entries.map((entry) => entry.count), 1);
  return (
    <section className="tickets-panel">
      <h2>{title}</h2>
      {entries.length === 0 ? (
        <p>Nothing recorded.</p>
      ) : (
        <ul className="stat-list compact metered">
          {entries.map((entry) => (
            <li key={entry.label}>
              <div className="stat-row">
                <span>{entry.label}</span>
                <strong>{entry.count}</strong>
              </div>
              <BarMeter value={entry.count} max={max} />
            </li>
          ))}
        </ul>
      )}
    </section>
  );
}

export default function TicketCategoriesRoute() {
  const data = useLoaderData<typeof loader>();

  if (!data.ok) {
    return <ReportError title={TITLE} error={data.error} />;
  }

  const { catalog, generatedAt, issues } = data.report;

  return (
    <ReportShell
      title={TITLE}
      description="Dual-axis classification: subject-matter category and ticket type."
      generatedAt={generatedAt}
      issues={issues}
    >
      <MetricSection title="Categorization" metric={catalog.metrics.categorization}>
        {(breakdown) => (
          <>
            <section className="metrics-grid">
              <MetricCard label="Categorized Tickets" value={breakdown.totalTickets} />
              <MetricCard label="Categories" value={breakdown.byCategory.length} />
              <MetricCard label="Ticket Types" value={breakdown.byType.length} />
              <MetricCard
                label="Avg Confidence"
                value={
                  breakdown.averageConfidence <= 1
                    ? formatPercent(breakdown.averageConfidence * 100)
                    : formatNumber(breakdown.averageConfidence, 1)
                }
              />
            </section>
            <div className="panels-grid">
              <CountList title="By Category" entries={breakdown.byCategory} />
              <CountList title="By Type" entries={breakdown.byType} />
              <CountList title="Top Components" entries={breakdown.topComponents} />
            </div>
            <DataTable
              title="Category x Type"
              rows={breakdown.matrix}
              rowKey={(cell) => `${cell.category}/${cell.type}`}
              exportTable="categories"
              columns={[
                { key: "category", label: "Category", render: (cell) => cell.category },
                { key: "type", label: "Type", render: (cell) => cell.type },
                { key: "count", label: "Tickets", numeric: true, render: (cell) => cell.count }
              ]}
            />
          </>
        )}
      </MetricSection>
    </ReportShell>
  );
}
