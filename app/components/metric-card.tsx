import { NOT_AVAILABLE } from "~/utils/format";

export type MetricAccent = "warning" | "success" | "neutral" | "danger";

interface MetricCardProps {
  label: string;
  value: number | string | null;
  helper?: string;
  delta?: string;
  accent?: MetricAccent;
}

export function MetricCard({ label, value, helper, delta, accent }: MetricCardProps) {
  const formattedValue = value === null ? NOT_AVAILABLE : typeof value === "number" ? value.toLocaleString() : value;
  const showDelta = delta !== undefined && delta !== NOT_AVAILABLE;

  return (
    <article className="metric-card" data-accent={value === null ? "neutral" : accent ?? "neutral"}>
      <h3>{label}</h3>
      <p className="value">{formattedValue}</p>
      {showDelta ? <p className="delta">{delta} YoY</p> : null}
      {helper ? <p className="meta">{helper}</p> : null}
    </article>
  );
}

export default MetricCard;
