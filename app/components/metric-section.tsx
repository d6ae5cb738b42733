import type { ReactNode } from "react";

import type { Metric } from "~/types/metrics";

interface MetricSectionProps<T> {
  title: string;
  metric: Metric<T>;
  children: (value: T) => ReactNode;
}

/** Renders `children` for available metrics and an N/A panel otherwise. */
export function MetricSection<T>({ title, metric, children }: MetricSectionProps<T>) {
  if (metric.status === "unavailable") {
    return (
      <section className="tickets-panel" data-unavailable="true">
        <h2>{title}</h2>
        <p className="unavailable">N/A: {metric.reason}</p>
      </section>
    );
  }
  return <>{children(metric.value)}</>;
}

export default MetricSection;
