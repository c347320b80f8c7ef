import { ClickstreamEvent } from "./Event";
import { FlowDiagram, FlowEdge } from "./Funnel";

export const EXPLORER_COLUMNS: readonly string[] = [
  "mp_brand",
  "mp_browser",
  "mp_carrier",
  "mp_city",
  "mp_country_code",
  "mp_manufacturer",
  "mp_model",
  "mp_os",
  "mp_os_version",
  "mp_region",
  "mp_wifi",
] as const;

export interface CategoryCount {
  value: string;
  count: number;
}

export interface PairCount {
  first: string;
  second: string;
  count: number;
}

export interface CategoryAggregate {
  value: string;
  count: number;
  mean: number | null;
}

export interface DailyCount {
  date: string;
  count: number;
}

export interface FunnelFlowView {
  edges: FlowEdge[];
  diagram: FlowDiagram;
}

export interface DashboardViews {
  funnelCounts: CategoryCount[];
  funnelFlow: FunnelFlowView;
  dailyTrend: DailyCount[];
  campaignConversions: CategoryCount[];
  osDistribution: CategoryCount[];
  paymentBreakdown: PairCount[];
  packPopularity: CategoryAggregate[];
  columnDistribution: CategoryCount[];
}

export type ViewId = keyof DashboardViews;

export interface ViewParams {
  selectedColumn: string | null;
  topN: number;
}

export interface ViewDefinition<K extends ViewId> {
  id: K;
  /** Columns checked once against the loaded schema. */
  requiredColumns: readonly string[];
  /** Columns chosen per refresh, checked on each refresh; null when none is chosen. */
  parameterColumns?: (params: ViewParams) => readonly string[] | null;
  compute: (events: readonly ClickstreamEvent[], params: ViewParams) => DashboardViews[K];
}

export type ViewRegistry = { [K in ViewId]: ViewDefinition<K> };

export interface SkippedView {
  id: ViewId;
  missingColumns: string[];
}
