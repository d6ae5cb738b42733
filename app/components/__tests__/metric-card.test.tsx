import { render, screen } from "@testing-library/react";
import { describe, expect, it } from "vitest";

import MetricCard from "~/components/metric-card";

describe("MetricCard", () => {
  it("shows the value with its year-over-year delta", () => {
    render(<MetricCard label="Total Tickets" value="1,350" delta="-10.0%" helper="2024: 1,500" accent="success" />);
    expect(screen.getByText("1,350")).toBeInTheDocument();
    expect(screen.getByText("-10.0% YoY")).toBeInTheDocument();
    expect(screen.getByRole("article")).toHaveAttribute("data-accent", "success");
  });

  it("renders N/A without a delta or accent when the value is missing", () => {
    render(<MetricCard label="Avg FRT (hours)" value={null} delta="N/A" accent="danger" />);
    expect(screen.getByText("N/A")).toBeInTheDocument();
    expect(screen.queryByText(/YoY/)).not.toBeInTheDocument();
    expect(screen.getByRole("article")).toHaveAttribute("data-accent", "neutral");
  });
});
