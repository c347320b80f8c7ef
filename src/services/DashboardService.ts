import {
  CONVERSION_EVENTS,
  DashboardViews,
  Dataset,
  EXPLORER_COLUMNS,
  FUNNEL_STEPS,
  FilterCriteria,
  FilterOptions,
  SkippedView,
  ViewId,
  ViewParams,
  ViewRegistry,
} from "../core/entities";
import { applyFilters, listFilterOptions } from "../core/engine/FilterEngine";
import { validateFunnelSteps } from "../core/engine/FunnelFlowBuilder";
import {
  VIEW_IDS,
  createViewRegistry,
  missingColumns,
  resolveViews,
} from "../core/engine/ViewRegistry";
import { DatasetStore } from "../data/DatasetStore";
import { InvalidCriteriaError } from "../core/errors";
import { isValidDate } from "../utils/time";

export interface DashboardConfig {
  funnelSteps: readonly string[];
  conversionEvents: readonly string[];
  explorerColumns: readonly string[];
  defaultTopN: number;
  minTopN: number;
  maxTopN: number;
}

export const DEFAULT_DASHBOARD_CONFIG: DashboardConfig = {
  funnelSteps: FUNNEL_STEPS,
  conversionEvents: CONVERSION_EVENTS,
  explorerColumns: EXPLORER_COLUMNS,
  defaultTopN: 20,
  minTopN: 5,
  maxTopN: 50,
};

export type ViewResults = { [K in ViewId]: DashboardViews[K] | null };

export interface DashboardSnapshot {
  criteria: FilterCriteria;
  params: ViewParams;
  totalCount: number;
  filteredCount: number;
  views: ViewResults;
  skipped: SkippedView[];
  executionTimeMs: number;
}

export interface Dashboard {
  readonly config: DashboardConfig;
  readonly dataset: Dataset;
  /** Device attribute columns present in the loaded dataset. */
  readonly explorerColumns: string[];
  filterOptions(): FilterOptions;
  /** Throws InvalidCriteriaError when a date bound is not a YYYY-MM-DD calendar date. */
  refresh(criteria: FilterCriteria, params?: Partial<ViewParams>): DashboardSnapshot;
}

function emptyResults(): ViewResults {
  return {
    funnelCounts: null,
    funnelFlow: null,
    dailyTrend: null,
    campaignConversions: null,
    osDistribution: null,
    paymentBreakdown: null,
    packPopularity: null,
    columnDistribution: null,
  };
}

function runView<K extends ViewId>(
  results: ViewResults,
  registry: ViewRegistry,
  id: K,
  events: Dataset["events"],
  params: ViewParams
): void {
  results[id] = registry[id].compute(events, params);
}

export function createDashboard(
  store: DatasetStore,
  config?: Partial<DashboardConfig>
): Dashboard {
  const cfg = { ...DEFAULT_DASHBOARD_CONFIG, ...config };
  validateFunnelSteps(cfg.funnelSteps);

  const dataset = store.get();
  const registry = createViewRegistry(cfg);
  const resolved = resolveViews(dataset.columns, registry);
  const explorerColumns = cfg.explorerColumns.filter((column) => dataset.columns.has(column));

  function resolveParams(params?: Partial<ViewParams>): ViewParams {
    return {
      selectedColumn:
        params?.selectedColumn !== undefined ? params.selectedColumn : explorerColumns[0] ?? null,
      topN: params?.topN ?? cfg.defaultTopN,
    };
  }

  function refresh(criteria: FilterCriteria, params?: Partial<ViewParams>): DashboardSnapshot {
    const startTime = Date.now();
    for (const bound of [criteria.startDate, criteria.endDate]) {
      if (!isValidDate(bound)) {
        throw new InvalidCriteriaError(`Invalid date bound (expected YYYY-MM-DD): ${bound}`);
      }
    }
    const viewParams = resolveParams(params);
    const filtered = applyFilters(dataset.events, criteria);
    const views = emptyResults();
    const skipped = [...resolved.skipped];

    for (const id of VIEW_IDS) {
      if (!resolved.enabled.includes(id)) continue;

      const parameterColumns = registry[id].parameterColumns;
      const dynamic = parameterColumns ? parameterColumns(viewParams) : [];
      if (dynamic === null) {
        skipped.push({ id, missingColumns: missingColumns(dataset.columns, cfg.explorerColumns) });
        continue;
      }

      const missing = missingColumns(dataset.columns, dynamic);
      if (missing.length > 0) {
        skipped.push({ id, missingColumns: missing });
        continue;
      }

      runView(views, registry, id, filtered, viewParams);
    }

    return {
      criteria,
      params: viewParams,
      totalCount: dataset.events.length,
      filteredCount: filtered.length,
      views,
      skipped,
      executionTimeMs: Date.now() - startTime,
    };
  }

  return {
    config: cfg,
    dataset,
    explorerColumns,
    filterOptions: () => listFilterOptions(dataset),
    refresh,
  };
}
