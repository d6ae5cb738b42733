import type { ReactNode } from "react";
import { Form } from "@remix-run/react";

import StatusBanner from "~/components/status-banner";
import { formatGeneratedAt } from "~/utils/format";

interface ShellIssue {
  dataset: string;
  file: string;
  status: "absent" | "malformed";
  reason: string | null;
}

interface ReportShellProps {
  title: string;
  description: string;
  generatedAt: string;
  issues: ShellIssue[];
  children: ReactNode;
}

function describeIssue(issue: ShellIssue) {
  return issue.status === "absent"
    ? `${issue.file} not found`
    : `${issue.file} could not be parsed: ${issue.reason ?? "unknown error"}`;
}

export function ReportShell({ title, description, generatedAt, issues, children }: ReportShellProps) {
  return (
    <div className="dashboard-shell">
      <header>
        <h1>{title}</h1>
        <p>{description}</p>
      </header>

      <div className="meta-row">
        <span>Generated: {formatGeneratedAt(generatedAt)}</span>
        <Form method="get">
          <button type="submit" name="refresh" value="1" className="btn-ghost">
            Refresh data
          </button>
        </Form>
      </div>

      {issues.length ? (
        <div className="banner-stack">
          <StatusBanner
            message={`${issues.length} dataset(s) unavailable. Affected metrics show N/A.`}
            variant="warning"
            details={issues.map(describeIssue)}
          />
        </div>
      ) : null}

      {children}
    </div>
  );
}

export function ReportError({ title, error }: { title: string; error: string }) {
  return (
    <div className="dashboard-shell">
      <header>
        <h1>{title}</h1>
        <p>Could not build the report from the data directory.</p>
      </header>
      <section className="tickets-panel">
        <h2>Troubleshooting</h2>
        <p>{error}</p>
        <ul>
          <li>Check that `REPORT_DATA_DIR` points at the folder holding the CSV summaries.</li>
          <li>Make sure the dashboard process can read the files.</li>
        </ul>
      </section>
    </div>
  );
}

export default ReportShell;
