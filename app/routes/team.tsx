import { useLoaderData } from "@remix-run/react";

import BarMeter from "~/components/bar-meter";
import DataTable from "~/components/data-table";
import MetricCard from "~/components/metric-card";
import MetricSection from "~/components/metric-section";
import ReportShell, { ReportError } from "~/components/report-shell";
import type { TeamLoaderData } from "~/routes/team.server";
import { formatChange, formatNumber, formatPercent } from "~/utils/format";

export { loader } from "~/routes/team.server";

const TITLE = "Team Scorecard";

function maxOf(values: number[]) {
  return Math.max(...values, 1);
}

export default function TeamScorecardRoute() {
  const data = useLoaderData<TeamLoaderData>();

  if (!data.ok) {
    return <ReportError title={TITLE} error={data.error} />;
  }

  const { years } = data;

  return (
    <ReportShell
      title={TITLE}
      description={`Performance within support levels for ${years.current}.`}
      generatedAt={data.generatedAt}
      issues={data.issues}
    >
      <div className="panels-grid">
        <MetricSection title="Level 1 Agents" metric={data.levelOne}>
          {(scorecard) => {
            const maxResolved = maxOf(scorecard.rankings.map(({ item }) => item.totalResolved));
            return (
              <section className="tickets-panel level-panel" data-level="1">
                <h2>Level 1 Agents</h2>
                <p className="list-sub">Direct customer support and ticket resolution</p>
                <div className="metrics-grid compact">
                  <MetricCard label="Avg Tickets/Agent" value={formatNumber(scorecard.avgTicketsResolved)} />
                  <MetricCard label="Avg Resolution Time" value={`${formatNumber(scorecard.avgResolutionDays, 1)}d`} />
                  <MetricCard label="Avg Resolution Rate" value={formatPercent(scorecard.avgResolutionRatePct)} />
                  <MetricCard label="Avg Eng Escalation" value={formatPercent(scorecard.avgEngineeringRatePct)} />
                </div>
                <DataTable
                  title="Individual Rankings"
                  rows={scorecard.rankings}
                  rowKey={({ item }) => item.assignee}
                  exportTable="level-one"
                  columns={[
                    { key: "rank", label: "#", render: ({ rank }) => rank },
                    { key: "assignee", label: "Agent", render: ({ item }) => item.assignee },
                    {
                      key: "resolved",
                      label: "Resolved",
                      render: ({ item }) => (
                        <BarMeter value={item.totalResolved} max={maxResolved} label={formatNumber(item.totalResolved)} />
                      )
                    },
                    {
                      key: "rate",
                      label: "Resolution Rate",
                      numeric: true,
                      render: ({ item }) => formatPercent(item.resolutionRatePct)
                    },
                    {
                      key: "days",
                      label: "Avg Resolution",
                      numeric: true,
                      render: ({ item }) => `${formatNumber(item.avgResolutionDays, 1)}d`
                    },
                    {
                      key: "eng",
                      label: "Eng Escalation",
                      numeric: true,
                      render: ({ item }) => formatPercent(item.engineeringRatePct)
                    }
                  ]}
                />
              </section>
            );
          }}
        </MetricSection>

        <MetricSection title="Level 2 Contributors" metric={data.levelTwo}>
          {(scorecard) => (
            <section className="tickets-panel level-panel" data-level="2">
              <h2>Level 2 Contributors</h2>
              <p className="list-sub">Technical triage and expert guidance</p>
              <div className="metrics-grid compact">
                <MetricCard label="Total Tickets Helped" value={scorecard.totalTicketsContributed} />
                <MetricCard label="Total Comments" value={scorecard.totalComments} />
                <MetricCard label="Avg Comments/Ticket" value={formatNumber(scorecard.avgCommentsPerTicket, 1)} />
                <MetricCard label="Avg Velocity/Day" value={formatNumber(scorecard.avgVelocityPerDay, 1)} />
              </div>
              <DataTable
                title="Individual Rankings"
                rows={scorecard.rankings}
                rowKey={({ item }) => item.contributor}
                exportTable="level-two"
                columns={[
                  { key: "rank", label: "#", render: ({ rank }) => rank },
                  { key: "contributor", label: "Contributor", render: ({ item }) => item.contributor },
                  { key: "role", label: "Role", render: ({ item }) => item.role || "-" },
                  { key: "tickets", label: "Tickets Helped", numeric: true, render: ({ item }) => item.ticketsContributed },
                  {
                    key: "comments",
                    label: "Avg Comments/Ticket",
                    numeric: true,
                    render: ({ item }) => formatNumber(item.avgCommentsPerTicket, 1)
                  },
                  {
                    key: "hold",
                    label: "Avg Hold Time",
                    numeric: true,
                    render: ({ item }) =>
                      item.avgHoldTimeHours === null ? "N/A" : `${formatNumber(item.avgHoldTimeHours, 1)}h`
                  }
                ]}
              />
            </section>
          )}
        </MetricSection>
      </div>

      <MetricSection title="Fastest Resolvers" metric={data.fastestResolvers}>
        {(entries) => (
          <section className="tickets-panel">
            <h2>Fastest Resolvers ({years.current})</h2>
            <ul className="stat-list">
              {entries.map(({ rank, item }) => (
                <li key={item.assignee}>
                  <span>
                    {rank}. {item.assignee}
                  </span>
                  <strong>{formatNumber(item.avgResolutionDays, 1)}d</strong>
                </li>
              ))}
            </ul>
          </section>
        )}
      </MetricSection>

      <MetricSection title="Agent Year-over-Year" metric={data.agentComparison}>
        {(entries) => (
          <DataTable
            title={`Resolved Tickets ${years.previous} vs ${years.current}`}
            rows={entries}
            rowKey={(entry) => entry.entity}
            emptyMessage="No agents appear in both years."
            exportTable="agent-comparison"
            columns={[
              { key: "agent", label: "Agent", render: (entry) => entry.entity },
              { key: "previous", label: String(years.previous), numeric: true, render: (entry) => entry.previous },
              { key: "current", label: String(years.current), numeric: true, render: (entry) => entry.current },
              {
                key: "difference",
                label: "Difference",
                numeric: true,
                render: (entry) => (entry.difference > 0 ? `+${entry.difference}` : String(entry.difference))
              },
              { key: "change", label: "Change", numeric: true, render: (entry) => formatChange(entry.change) }
            ]}
          />
        )}
      </MetricSection>
    </ReportShell>
  );
}
