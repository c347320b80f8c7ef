import {
  EVENT_DATE_COLUMN,
  EVENT_NAME_COLUMN,
  SkippedView,
  ViewId,
  ViewRegistry,
} from "../entities";
import { aggregateBy, countBy, countByPair, topN } from "./Aggregations";
import { buildFlowDiagram, buildFunnelFlow } from "./FunnelFlowBuilder";

export interface ViewRegistryConfig {
  funnelSteps: readonly string[];
  conversionEvents: readonly string[];
}

export function createViewRegistry(config: ViewRegistryConfig): ViewRegistry {
  const { funnelSteps, conversionEvents } = config;

  return {
    funnelCounts: {
      id: "funnelCounts",
      requiredColumns: [EVENT_NAME_COLUMN],
      compute: (events) =>
        countBy(events, EVENT_NAME_COLUMN, { only: funnelSteps, order: funnelSteps }),
    },
    funnelFlow: {
      id: "funnelFlow",
      requiredColumns: [EVENT_NAME_COLUMN],
      compute: (events) => {
        const edges = buildFunnelFlow(events, funnelSteps);
        return { edges, diagram: buildFlowDiagram(edges, funnelSteps) };
      },
    },
    dailyTrend: {
      id: "dailyTrend",
      requiredColumns: [],
      compute: (events) =>
        countBy(events, EVENT_DATE_COLUMN)
          .map(({ value, count }) => ({ date: value, count }))
          .sort((a, b) => a.date.localeCompare(b.date)),
    },
    campaignConversions: {
      id: "campaignConversions",
      requiredColumns: ["af_campaign"],
      compute: (events) => countBy(events, "af_campaign", { only: conversionEvents }),
    },
    osDistribution: {
      id: "osDistribution",
      requiredColumns: ["mp_os"],
      compute: (events) => countBy(events, "mp_os"),
    },
    paymentBreakdown: {
      id: "paymentBreakdown",
      requiredColumns: ["payment_method", "payment_status"],
      compute: (events) => countByPair(events, ["payment_method", "payment_status"]),
    },
    packPopularity: {
      id: "packPopularity",
      requiredColumns: ["pack_name", "pack_price"],
      compute: (events) => aggregateBy(events, "pack_name", "pack_price"),
    },
    columnDistribution: {
      id: "columnDistribution",
      requiredColumns: [],
      parameterColumns: (params) => (params.selectedColumn ? [params.selectedColumn] : null),
      compute: (events, params) =>
        params.selectedColumn ? topN(events, params.selectedColumn, params.topN) : [],
    },
  };
}

export const VIEW_IDS: readonly ViewId[] = [
  "funnelCounts",
  "funnelFlow",
  "dailyTrend",
  "campaignConversions",
  "osDistribution",
  "paymentBreakdown",
  "packPopularity",
  "columnDistribution",
] as const;

export function missingColumns(
  columns: ReadonlySet<string>,
  required: readonly string[]
): string[] {
  return required.filter((column) => !columns.has(column));
}

export interface ResolvedViews {
  enabled: ViewId[];
  skipped: SkippedView[];
}

/** Split views into those the schema can serve and those it cannot. */
export function resolveViews(columns: ReadonlySet<string>, registry: ViewRegistry): ResolvedViews {
  const enabled: ViewId[] = [];
  const skipped: SkippedView[] = [];

  for (const id of VIEW_IDS) {
    const missing = missingColumns(columns, registry[id].requiredColumns);
    if (missing.length > 0) {
      skipped.push({ id, missingColumns: missing });
    } else {
      enabled.push(id);
    }
  }

  return { enabled, skipped };
}
