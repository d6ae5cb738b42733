import type { MeasuredValue } from "./datasets";

export type Metric<T> = { status: "available"; value: T } | { status: "unavailable"; reason: string };

export interface ReportYears {
  previous: number;
  current: number;
}

export type ChangeUnit = "percent" | "points";

export interface YearComparison {
  previous: number;
  current: number;
  change: Metric<number>;
  changeUnit: ChangeUnit;
}

export interface CategoryComparison {
  category: string;
  comparison: Metric<YearComparison>;
}

export type Trend = "improved" | "worsened" | "unchanged" | "unknown";

export interface SummaryRow {
  label: string;
  previous: number;
  current: number;
  valueUnit: "count" | "percent" | "days" | "hours";
  change: Metric<number>;
  changeUnit: ChangeUnit;
  trend: Trend;
}

export interface RankedEntry<T> {
  rank: number;
  item: T;
}

export interface EngineeringSummaryEntry {
  metric: string;
  previous: MeasuredValue | null;
  current: MeasuredValue | null;
  change: Metric<number>;
  changeUnit: ChangeUnit;
}

export interface EngineeringTeamEntry {
  team: string;
  previousTickets: number | null;
  currentTickets: number;
  change: Metric<number>;
  reportedChange: MeasuredValue | null;
}

export interface OrganizationEntry {
  organization: string;
  previousTickets: number | null;
  currentTickets: number;
  change: Metric<number>;
  avgResolutionDays: number | null;
}

export type TierId = "enterprise" | "growth" | "standard" | "self-service";

export interface OrganizationTier {
  id: TierId;
  label: string;
  minTickets: number;
  maxTickets: number | null;
  organizations: OrganizationEntry[];
  totalTickets: number;
}

export interface UntieredOrganization {
  organization: string;
  reason: string;
}

export interface OrganizationTiering {
  tiers: OrganizationTier[];
  untiered: UntieredOrganization[];
}

export interface BacklogPoint {
  month: string;
  monthIndex: number;
  created: number;
  resolved: number;
  net: number;
  backlog: number;
}

export interface BacklogSeries {
  year: number;
  points: BacklogPoint[];
}

export interface AgentEntry {
  assignee: string;
  totalAssigned: number;
  totalResolved: number;
  avgResolutionDays: number;
  resolutionRatePct: number;
  engineeringRatePct: number;
  supportLevel: string;
}

export interface LevelOneScorecard {
  agentCount: number;
  avgTicketsResolved: number;
  avgResolutionDays: number;
  avgResolutionRatePct: number;
  avgEngineeringRatePct: number;
  rankings: RankedEntry<AgentEntry>[];
}

export interface ContributorEntry {
  contributor: string;
  role: string;
  ticketsContributed: number;
  totalComments: number;
  avgCommentsPerTicket: number;
  commentVelocityPerDay: number;
  avgHoldTimeHours: number | null;
}

export interface LevelTwoScorecard {
  contributorCount: number;
  totalTicketsContributed: number;
  totalComments: number;
  avgCommentsPerTicket: number;
  avgVelocityPerDay: number;
  rankings: RankedEntry<ContributorEntry>[];
}

export interface EntityComparison {
  entity: string;
  previous: number;
  current: number;
  difference: number;
  change: Metric<number>;
}

export interface LabelCount {
  label: string;
  count: number;
}

export interface CategorizationBreakdown {
  totalTickets: number;
  averageConfidence: number;
  byCategory: LabelCount[];
  byType: LabelCount[];
  matrix: Array<{ category: string; type: string; count: number }>;
  topComponents: LabelCount[];
}

export interface CatalogMetrics {
  totalTickets: Metric<YearComparison>;
  engineeringInvolvement: Metric<YearComparison>;
  avgFirstResponseHours: Metric<YearComparison>;
  avgResolutionDays: Metric<YearComparison>;
  resolutionBySeverity: Metric<CategoryComparison[]>;
  firstResponseBySeverity: Metric<CategoryComparison[]>;
  yearOverYearSummary: Metric<SummaryRow[]>;
  engineeringSummary: Metric<EngineeringSummaryEntry[]>;
  engineeringTeams: Metric<RankedEntry<EngineeringTeamEntry>[]>;
  organizationTiers: Metric<OrganizationTiering>;
  topOrganizations: Metric<RankedEntry<OrganizationEntry>[]>;
  backlog: Metric<BacklogSeries[]>;
  levelOneScorecard: Metric<LevelOneScorecard>;
  levelTwoScorecard: Metric<LevelTwoScorecard>;
  fastestResolvers: Metric<RankedEntry<AgentEntry>[]>;
  agentYearOverYear: Metric<EntityComparison[]>;
  categorization: Metric<CategorizationBreakdown>;
}

export interface MetricsCatalog {
  years: ReportYears;
  metrics: CatalogMetrics;
}
