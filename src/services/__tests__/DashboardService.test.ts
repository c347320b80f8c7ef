import { createDashboard, DEFAULT_DASHBOARD_CONFIG } from "../DashboardService";
import { DatasetStore } from "../../data/DatasetStore";
import { ALL, CellValue, ClickstreamEvent, Dataset, FilterCriteria } from "../../core/entities";
import { InvalidCriteriaError, InvalidFunnelError } from "../../core/errors";

function event(
  eventName: string,
  eventDate: string,
  attributes: Record<string, CellValue> = {}
): ClickstreamEvent {
  return { eventTime: `${eventDate} 09:30:00`, eventDate, eventName, attributes };
}

function storeOf(events: ClickstreamEvent[], columns: string[]): DatasetStore {
  const dataset: Dataset = {
    events,
    columns: new Set(["event_time", "event_name", "event_date", ...columns]),
    source: "memory",
    loadedAt: "2025-01-10T00:00:00.000Z",
  };
  return new DatasetStore({ load: () => dataset });
}

const FULL_COLUMNS = [
  "platform",
  "user_type",
  "af_campaign",
  "mp_os",
  "mp_brand",
  "payment_method",
  "payment_status",
  "pack_name",
  "pack_price",
];

const EVENTS: ClickstreamEvent[] = [
  event("SUBSCRIPTION-CURATED-PLAN-SELECTION-LAUNCH", "2025-01-01", { platform: "android", user_type: "new", mp_os: "Android", mp_brand: "acme" }),
  event("SUBSCRIPTION-CURATED-PLAN-SELECTION-LAUNCH", "2025-01-01", { platform: "ios", user_type: "new", mp_os: "iOS", mp_brand: "orbit" }),
  event("SUBSCRIPTION-CURATED-PLAN-SELECTION-PROCEED", "2025-01-02", { platform: "android", user_type: "new", mp_os: "Android", mp_brand: "acme" }),
  event("PAYMENT", "2025-01-02", { platform: "android", user_type: "returning", payment_method: "upi", payment_status: "success", mp_os: "Android" }),
  event("SUBSCRIBE-SUCCESS", "2025-01-03", { platform: "android", user_type: "returning", af_campaign: "spring", pack_name: "basic", pack_price: 199 }),
  event("SUBSCRIBE-SUCCESS", "2025-01-04", { platform: "ios", user_type: "new", af_campaign: "spring", pack_name: "premium", pack_price: 499 }),
];

const ALL_DATES: FilterCriteria = {
  startDate: "2025-01-01",
  endDate: "2025-01-04",
  platform: ALL,
  userType: ALL,
};

describe("DashboardService", () => {
  it("should compute every view over the filtered events", () => {
    const dashboard = createDashboard(storeOf(EVENTS, FULL_COLUMNS));
    const snapshot = dashboard.refresh({ ...ALL_DATES, platform: "android" });

    expect(snapshot.totalCount).toBe(6);
    expect(snapshot.filteredCount).toBe(4);
    expect(snapshot.skipped).toEqual([]);

    const { views } = snapshot;
    expect(views.funnelCounts?.[0]).toEqual({ value: "SUBSCRIPTION-CURATED-PLAN-SELECTION-LAUNCH", count: 1 });
    expect(views.funnelFlow?.edges[0]).toEqual({
      source: "SUBSCRIPTION-CURATED-PLAN-SELECTION-LAUNCH",
      target: "SUBSCRIPTION-CURATED-PLAN-SELECTION-PROCEED",
      volume: 1,
      conversionPercent: 100,
    });
    expect(views.dailyTrend).toEqual([
      { date: "2025-01-01", count: 1 },
      { date: "2025-01-02", count: 2 },
      { date: "2025-01-03", count: 1 },
    ]);
    expect(views.campaignConversions).toEqual([{ value: "spring", count: 1 }]);
    expect(views.osDistribution).toEqual([{ value: "Android", count: 3 }]);
    expect(views.paymentBreakdown).toEqual([{ first: "upi", second: "success", count: 1 }]);
    expect(views.packPopularity).toEqual([{ value: "basic", count: 1, mean: 199 }]);
    expect(views.columnDistribution).toEqual([{ value: "acme", count: 2 }]);
  });

  it("should default the distribution to the first present device column", () => {
    const dashboard = createDashboard(storeOf(EVENTS, FULL_COLUMNS));
    expect(dashboard.explorerColumns).toEqual(["mp_brand", "mp_os"]);

    const snapshot = dashboard.refresh(ALL_DATES);
    expect(snapshot.params).toEqual({ selectedColumn: "mp_brand", topN: DEFAULT_DASHBOARD_CONFIG.defaultTopN });
  });

  it("should honour the selected column and top-N", () => {
    const dashboard = createDashboard(storeOf(EVENTS, FULL_COLUMNS));
    const snapshot = dashboard.refresh(ALL_DATES, { selectedColumn: "platform", topN: 1 });

    expect(snapshot.views.columnDistribution).toEqual([{ value: "android", count: 4 }]);
  });

  it("should skip views whose columns are missing and still run the others", () => {
    const dashboard = createDashboard(storeOf(EVENTS, ["platform", "user_type", "mp_os"]));
    const snapshot = dashboard.refresh(ALL_DATES);

    expect(snapshot.views.campaignConversions).toBeNull();
    expect(snapshot.views.paymentBreakdown).toBeNull();
    expect(snapshot.views.packPopularity).toBeNull();
    expect(snapshot.views.osDistribution).toEqual([
      { value: "Android", count: 3 },
      { value: "iOS", count: 1 },
    ]);
    expect(snapshot.skipped.map((s) => s.id)).toEqual([
      "campaignConversions",
      "paymentBreakdown",
      "packPopularity",
    ]);
  });

  it("should skip the distribution when the selected column is not in the dataset", () => {
    const dashboard = createDashboard(storeOf(EVENTS, FULL_COLUMNS));
    const snapshot = dashboard.refresh(ALL_DATES, { selectedColumn: "mp_carrier" });

    expect(snapshot.views.columnDistribution).toBeNull();
    expect(snapshot.skipped).toEqual([{ id: "columnDistribution", missingColumns: ["mp_carrier"] }]);
  });

  it("should report the distribution as skipped when no device column is present", () => {
    const dashboard = createDashboard(storeOf(EVENTS, ["platform", "user_type"]));
    expect(dashboard.explorerColumns).toEqual([]);

    const snapshot = dashboard.refresh(ALL_DATES);
    expect(snapshot.params.selectedColumn).toBeNull();
    expect(snapshot.views.columnDistribution).toBeNull();
    expect(snapshot.skipped).toContainEqual({
      id: "columnDistribution",
      missingColumns: [...DEFAULT_DASHBOARD_CONFIG.explorerColumns],
    });
  });

  it("should reject date bounds that are not YYYY-MM-DD", () => {
    const dashboard = createDashboard(storeOf(EVENTS, FULL_COLUMNS));

    expect(() => dashboard.refresh({ ...ALL_DATES, startDate: "2025-1-5" })).toThrow(InvalidCriteriaError);
    expect(() => dashboard.refresh({ ...ALL_DATES, endDate: "2025-02-30" })).toThrow(
      "Invalid date bound (expected YYYY-MM-DD): 2025-02-30"
    );
  });

  it("should render empty tables for a filter that matches nothing", () => {
    const dashboard = createDashboard(storeOf(EVENTS, FULL_COLUMNS));
    const snapshot = dashboard.refresh({ ...ALL_DATES, startDate: "2025-02-01", endDate: "2025-02-28" });

    expect(snapshot.filteredCount).toBe(0);
    expect(snapshot.views.dailyTrend).toEqual([]);
    expect(snapshot.views.campaignConversions).toEqual([]);
    expect(snapshot.views.funnelCounts?.every((row) => row.count === 0)).toBe(true);
    expect(snapshot.views.funnelFlow?.edges.every((edge) => edge.conversionPercent === 0)).toBe(true);
  });

  it("should load the dataset once across refreshes", () => {
    const load = jest.fn(() => storeOf(EVENTS, FULL_COLUMNS).get());
    const dashboard = createDashboard(new DatasetStore({ load }));

    dashboard.refresh(ALL_DATES);
    dashboard.refresh({ ...ALL_DATES, userType: "new" });

    expect(load).toHaveBeenCalledTimes(1);
  });

  it("should reject a funnel with duplicate steps before loading", () => {
    const load = jest.fn(() => storeOf(EVENTS, FULL_COLUMNS).get());

    expect(() => createDashboard(new DatasetStore({ load }), { funnelSteps: ["A", "B", "A"] })).toThrow(
      InvalidFunnelError
    );
    expect(load).not.toHaveBeenCalled();
  });

  it("should use a custom funnel", () => {
    const dashboard = createDashboard(storeOf(EVENTS, FULL_COLUMNS), {
      funnelSteps: ["PAYMENT", "SUBSCRIBE-SUCCESS"],
    });
    const snapshot = dashboard.refresh(ALL_DATES);

    expect(snapshot.views.funnelFlow?.edges).toEqual([
      { source: "PAYMENT", target: "SUBSCRIBE-SUCCESS", volume: 1, conversionPercent: 200 },
    ]);
  });

  it("should expose filter options for the loaded dataset", () => {
    const dashboard = createDashboard(storeOf(EVENTS, FULL_COLUMNS));
    expect(dashboard.filterOptions()).toEqual({
      minDate: "2025-01-01",
      maxDate: "2025-01-04",
      platforms: [ALL, "android", "ios"],
      userTypes: [ALL, "new", "returning"],
    });
  });
});
