import { createStore } from "zustand/vanilla";
import { calculateDashboard, type DashboardKpis } from "../lib/kpi/calculation-engine";
import type { PeriodGranularity, RecordFilter } from "../lib/kpi/types";
import type { DataSource, DataSourceKind } from "../lib/data/types";
import type { Logger } from "../lib/logger";
import type { EngineConfig, StoreRecord } from "../lib/schemas";

export type LoadStatus = "idle" | "loading" | "ready" | "error";

export interface DashboardState {
  records: StoreRecord[];
  filter: RecordFilter;
  granularity: PeriodGranularity;
  status: LoadStatus;
  error: string | null;
  source: DataSourceKind | null;
  setRecords: (records: StoreRecord[], source?: DataSourceKind | null) => void;
  toggleStore: (storeCode: string) => void;
  setYears: (years: number[]) => void;
  setPeriodRange: (from?: string, to?: string) => void;
  setGranularity: (granularity: PeriodGranularity) => void;
  load: (source: DataSource, years: number[]) => Promise<void>;
  reset: () => void;
}

type DashboardData = Pick<DashboardState, "records" | "filter" | "granularity" | "status" | "error" | "source">;

const initialState: DashboardData = {
  records: [],
  filter: {},
  granularity: "month",
  status: "idle",
  error: null,
  source: null,
};

/**
 * Holds the loaded records and the active filter. KPIs are not stored;
 * derive them with `selectDashboardKpis`. A load that is overtaken by a newer
 * one is discarded.
 */
export function createDashboardStore(logger?: Logger) {
  let latestLoad = 0;

  return createStore<DashboardState>()((set, get) => ({
    ...initialState,

    setRecords: (records, source = null) => set({ records, source, status: "ready", error: null }),

    toggleStore: (storeCode) =>
      set((state) => {
        const current = state.filter.stores ?? [];
        const stores = current.includes(storeCode)
          ? current.filter((code) => code !== storeCode)
          : [...current, storeCode].sort();
        return { filter: { ...state.filter, stores } };
      }),

    setYears: (years) => set((state) => ({ filter: { ...state.filter, years: [...years].sort((a, b) => a - b) } })),

    setPeriodRange: (from, to) => set((state) => ({ filter: { ...state.filter, from, to } })),

    setGranularity: (granularity) => set({ granularity }),

    load: async (source, years) => {
      const loadId = ++latestLoad;
      set({ status: "loading", error: null });
      try {
        const records = await source.loadRecords(years);
        if (loadId !== latestLoad) return;
        set({
          records,
          source: source.kind,
          status: "ready",
          filter: { ...get().filter, years: [...years].sort((a, b) => a - b) },
        });
      } catch (err) {
        if (loadId !== latestLoad) return;
        const message = err instanceof Error ? err.message : String(err);
        logger?.error({ err, source: source.kind }, "record load failed");
        set({ status: "error", error: message });
      }
    },

    reset: () => {
      latestLoad++;
      set({ ...initialState });
    },
  }));
}

export type DashboardStore = ReturnType<typeof createDashboardStore>;

export function selectDashboardKpis(
  state: Pick<DashboardState, "records" | "filter" | "granularity">,
  config: EngineConfig,
): DashboardKpis {
  return calculateDashboard(state.records, config, state.filter, state.granularity);
}
