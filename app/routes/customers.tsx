import type { LoaderFunctionArgs } from "@remix-run/node";
import { json } from "@remix-run/node";
import { useLoaderData } from "@remix-run/react";

import BarMeter from "~/components/bar-meter";
import DataTable from "~/components/data-table";
import MetricCard from "~/components/metric-card";
import MetricSection from "~/components/metric-section";
import ReportShell, { ReportError } from "~/components/report-shell";
import StatusBanner from "~/components/status-banner";
import { formatChange, formatNumber } from "~/utils/format";
import { loadReportData } from "~/utils/report.server";

const TITLE = "Customer Intelligence";

export async function loader({ request }: LoaderFunctionArgs) {
  const data = await loadReportData(request);
  return json(data, { status: data.ok ? 200 : 500 });
}

function tierRange(minTickets: number, maxTickets: number | null) {
  return maxTickets === null ? `${minTickets}+ tickets` : `${minTickets}-${maxTickets - 1} tickets`;
}

export default function CustomerIntelligenceRoute() {
  const data = useLoaderData<typeof loader>();

  if (!data.ok) {
    return <ReportError title={TITLE} error={data.error} />;
  }

  const { catalog, generatedAt, issues } = data.report;
  const { metrics, years } = catalog;

  return (
    <ReportShell
      title={TITLE}
      description={`Organizations segmented by ${years.current} ticket volume.`}
      generatedAt={generatedAt}
      issues={issues}
    >
      <MetricSection title="Support Tiers" metric={metrics.organizationTiers}>
        {({ tiers, untiered }) => (
          <>
            {untiered.length ? (
              <StatusBanner
                message={`${untiered.length} organization(s) could not be tiered.`}
                variant="warning"
                details={untiered.map((entry) => `${entry.organization}: ${entry.reason}`)}
              />
            ) : null}
            <section className="metrics-grid">
              {tiers.map((tier) => (
                <MetricCard
                  key={tier.id}
                  label={tier.label}
                  value={tier.organizations.length}
                  helper={`${tierRange(tier.minTickets, tier.maxTickets)} / ${formatNumber(tier.totalTickets)} total`}
                />
              ))}
            </section>
            <DataTable
              title="Tier Membership"
              rows={tiers.flatMap((tier) => tier.organizations.map((entry) => ({ tier: tier.label, entry })))}
              rowKey={({ entry }) => entry.organization}
              exportTable="organization-tiers"
              columns={[
                { key: "tier", label: "Tier", render: (row) => row.tier },
                { key: "organization", label: "Organization", render: (row) => row.entry.organization },
                {
                  key: "tickets",
                  label: `${years.current} Tickets`,
                  numeric: true,
                  render: (row) => formatNumber(row.entry.currentTickets)
                }
              ]}
            />
          </>
        )}
      </MetricSection>

      <MetricSection title="Top Customers by Volume" metric={metrics.topOrganizations}>
        {(entries) => {
          const maxTickets = Math.max(...entries.map(({ item }) => item.currentTickets), 1);
          return (
            <DataTable
              title="Top Customers by Volume"
              rows={entries}
              rowKey={({ item }) => item.organization}
              exportTable="organizations"
              columns={[
                { key: "rank", label: "#", render: ({ rank }) => rank },
                { key: "organization", label: "Organization", render: ({ item }) => item.organization },
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
                { key: "change", label: "Change", numeric: true, render: ({ item }) => formatChange(item.change) },
                {
                  key: "resolution",
                  label: "Avg Resolution (days)",
                  numeric: true,
                  render: ({ item }) => formatNumber(item.avgResolutionDays, 1)
                }
              ]}
            />
          );
        }}
      </MetricSection>
    </ReportShell>
  );
}
