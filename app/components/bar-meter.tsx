interface BarMeterProps {
  value: number;
  max: number;
  label?: string;
}

export function BarMeter({ value, max, label }: BarMeterProps) {
  const width = max > 0 ? Math.max(0, Math.min(100, (value / max) * 100)) : 0;
  return (
    <div className="table-metric">
      {label !== undefined ? <span>{label}</span> : null}
      <div className="bar-track">
        <span className="bar-fill" style={{ width: `${width}%` }} />
      </div>
    </div>
  );
}

export default BarMeter;
