export type MeasuredUnit = "percent" | "number";

export interface MeasuredValue {
  value: number;
  unit: MeasuredUnit;
}

/** Values keyed by the four-digit year prefix of `{year}_{field}` columns. */
export type YearValues<T = number> = ReadonlyMap<number, T>;

export interface MonthlyRow {
  month: string;
  monthIndex: number;
  year: number;
  created: number;
  resolved: number;
}

export interface SeverityRow {
  severity: string;
  byYear: YearValues;
}

export interface EngineeringSummaryRow {
  metric: string;
  byYear: YearValues<MeasuredValue>;
}

export interface EngineeringTeamRow {
  team: string;
  ticketsByYear: YearValues;
  reportedChange: MeasuredValue | null;
}

export interface OrganizationRow {
  organization: string;
  ticketsByYear: YearValues;
  avgResolutionDaysByYear: YearValues;
}

export interface AssigneeRow {
  assignee: string;
  year: number;
  totalAssigned: number;
  totalResolved: number;
  avgResolutionDays: number;
  resolutionRatePct: number;
  engineeringRatePct: number;
  supportLevel: string;
}

export interface ContributorRow {
  contributor: string;
  year: number;
  ticketsContributed: number;
  totalComments: number;
  avgCommentsPerTicket: number;
  commentVelocityPerDay: number;
  role: string;
  avgHoldTimeHours: number | null;
}

export interface CategorizationRow {
  ticketKey: string;
  category: string;
  type: string;
  confidence: number;
  reasoning: string;
  components: string[];
}

export interface DatasetMap {
  monthly: MonthlyRow[];
  resolution: SeverityRow[];
  firstResponse: SeverityRow[];
  engineeringSummary: EngineeringSummaryRow[];
  engineeringTeams: EngineeringTeamRow[];
  organizations: OrganizationRow[];
  assignees: AssigneeRow[];
  contributors: ContributorRow[];
  categorization: CategorizationRow[];
}

export type DatasetName = keyof DatasetMap;

/** Engine input: whichever datasets loaded this cycle. */
export type Datasets = Partial<DatasetMap>;

export type DatasetLoadResult<T> =
  | { status: "loaded"; data: T }
  | { status: "absent" }
  | { status: "malformed"; reason: string };

export type DatasetLoadResults = {
  [K in DatasetName]: DatasetLoadResult<DatasetMap[K]>;
};

export const DATASET_NAMES: DatasetName[] = [
  "monthly",
  "resolution",
  "firstResponse",
  "engineeringSummary",
  "engineeringTeams",
  "organizations",
  "assignees",
  "contributors",
  "categorization"
];
