interface StatusBannerProps {
  message: string;
  variant?: "info" | "warning" | "error";
  details?: string[];
}

export function StatusBanner({ message, variant = "info", details = [] }: StatusBannerProps) {
  return (
    <div className={`status-banner status-banner--${variant}`} role={variant === "error" ? "alert" : "status"}>
      <span>{message}</span>
      {details.length ? (
        <ul className="status-banner__details">
          {details.map((detail) => (
            <li key={detail}>{detail}</li>
          ))}
        </ul>
      ) : null}
    </div>
  );
}

export default StatusBanner;
