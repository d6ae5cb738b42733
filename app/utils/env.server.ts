import path from "node:path";

const DEFAULT_DATA_DIR = "data";

export interface ReportConfig {
  dataDir: string;
}

let cachedConfig: ReportConfig | null = null;

function loadConfig(): ReportConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const configured = process.env.REPORT_DATA_DIR?.trim();
  const dataDir = configured || DEFAULT_DATA_DIR;

  cachedConfig = {
    dataDir: path.isAbsolute(dataDir) ? dataDir : path.join(process.cwd(), dataDir)
  };
  return cachedConfig;
}

export function getReportConfig() {
  return loadConfig();
}

export function resetReportConfig() {
  cachedConfig = null;
}
