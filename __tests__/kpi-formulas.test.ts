import { describe, it, expect } from "vitest";
import { KpiValidationError } from "@/lib/errors";
import {
  annualizedRoi,
  breakEvenRevenue,
  clvCacRatio,
  contributionMargin,
  customerAcquisitionCost,
  customerLifetimeValue,
  daysInventoryOutstanding,
  estimatedLifespanPeriods,
  grossMargin,
  growthRate,
  laborCostPct,
  monthsToPayback,
  netMargin,
  opexRatio,
  percentOfRevenue,
  retentionRate,
  revenuePerSquareMeter,
  roi,
  safeDivide,
  sharePct,
  variableCostRatio,
  wasteRate,
} from "@/lib/kpi/kpi-formulas";

describe("profitability formulas", () => {
  it("computes gross and net margin for a store month", () => {
    expect(grossMargin(10_000, 4_000)).toBe(60);
    expect(netMargin(10_000, 8_500)).toBe(15);
  });

  it("computes the opex ratio excluding cogs", () => {
    expect(opexRatio(20_000, 17_000, 8_000)).toBe(45);
  });

  it("matches the scenario of 100k revenue against 40k cogs", () => {
    expect(grossMargin(100_000, 40_000)).toBe(60);
  });

  it("equals (revenue - cogs) / revenue * 100 exactly", () => {
    for (let revenue = 1; revenue <= 200; revenue++) {
      for (let cogs = 0; cogs <= revenue; cogs++) {
        expect(grossMargin(revenue, cogs)).toBe(((revenue - cogs) / revenue) * 100);
      }
    }
  });

  it("returns null for every percent-of-revenue metric when revenue is zero", () => {
    expect(grossMargin(0, 0)).toBeNull();
    expect(netMargin(0, 1_500)).toBeNull();
    expect(opexRatio(0, 1_500, 0)).toBeNull();
    expect(laborCostPct(2_500, 0)).toBeNull();
    expect(percentOfRevenue(-1_500, 0)).toBeNull();
    expect(sharePct(0, 0)).toBeNull();
  });

  it("evaluates shares as part / whole * 100", () => {
    expect(sharePct(40, 199)).toBe((40 / 199) * 100);
    expect(laborCostPct(7, 30)).toBe((7 / 30) * 100);
    expect(growthRate(199, 40)).toBe(((199 - 40) / 40) * 100);
  });

  it("gross margin decreases as cogs grow", () => {
    const margins = [0, 1_000, 2_500, 5_000, 9_999].map((cogs) => grossMargin(10_000, cogs) ?? 0);
    for (let i = 1; i < margins.length; i++) {
      expect(margins[i]).toBeLessThan(margins[i - 1]);
    }
  });
});

describe("ROI formulas", () => {
  it("computes ROI and annualizes it over months operating", () => {
    expect(roi(20_000, 100_000)).toBe(20);
    expect(annualizedRoi(20, 6)).toBe(40);
  });

  it("matches the scenario of 10k profit on a 50k investment over six months", () => {
    const pct = roi(10_000, 50_000);
    expect(pct).toBe(20);
    expect(annualizedRoi(pct, 6)).toBe(40);
  });

  it("equals roi / months * 12 exactly", () => {
    for (let pct = 1; pct <= 200; pct++) {
      for (let months = 1; months <= 48; months++) {
        expect(annualizedRoi(pct, months)).toBe((pct / months) * 12);
      }
    }
  });

  it("returns null when there is no investment or no operating months", () => {
    expect(roi(5_000, 0)).toBeNull();
    expect(annualizedRoi(20, 0)).toBeNull();
    expect(annualizedRoi(null, 6)).toBeNull();
  });

  it("allows negative cumulative profit", () => {
    expect(roi(-1_000, 50_000)).toBe(-2);
  });
});

describe("break-even formulas", () => {
  it("derives break-even revenue from the contribution margin", () => {
    const ratio = variableCostRatio(60_000, 100_000);
    expect(ratio).toBe(0.6);
    expect(contributionMargin(ratio)).toBeCloseTo(0.4, 10);
    expect(breakEvenRevenue(20_000, ratio)).toBeCloseTo(50_000, 6);
  });

  it("marks break-even unreachable once variable costs consume all revenue", () => {
    expect(breakEvenRevenue(1_000, 1)).toBe(Infinity);
    expect(breakEvenRevenue(1_000, 1.2)).toBe(Infinity);
  });

  it("returns null break-even when the variable cost ratio is undefined", () => {
    expect(variableCostRatio(500, 0)).toBeNull();
    expect(breakEvenRevenue(1_000, null)).toBeNull();
  });

  it("computes months to payback, unreachable without profit", () => {
    expect(monthsToPayback(12_000, 1_000)).toBe(12);
    expect(monthsToPayback(12_000, 0)).toBe(Infinity);
    expect(monthsToPayback(12_000, -250)).toBe(Infinity);
  });
});

describe("customer formulas", () => {
  it("computes CAC, CLV and their ratio", () => {
    const cac = customerAcquisitionCost(5_000, 50);
    const clv = customerLifetimeValue(100, 36);
    expect(cac).toBe(100);
    expect(clv).toBe(3_600);
    expect(clvCacRatio(clv, cac)).toBe(36);
  });

  it("returns null ratio when CAC is zero or unknown", () => {
    expect(clvCacRatio(3_600, 0)).toBeNull();
    expect(clvCacRatio(3_600, null)).toBeNull();
    expect(customerAcquisitionCost(500, 0)).toBeNull();
  });

  it("estimates lifespan from retention with a cap and a full-retention fallback", () => {
    expect(estimatedLifespanPeriods(0, 36, 24)).toBe(1);
    expect(estimatedLifespanPeriods(0.5, 36, 24)).toBe(2);
    expect(estimatedLifespanPeriods(0.99, 36, 24)).toBe(36);
    expect(estimatedLifespanPeriods(1, 36, 24)).toBe(24);
  });

  it("computes retention as a percentage", () => {
    expect(retentionRate(450, 1_000)).toBe(45);
  });
});

describe("operational formulas", () => {
  it("computes growth over a prior period", () => {
    expect(growthRate(110, 100)).toBe(10);
    expect(growthRate(90, 100)).toBe(-10);
    expect(growthRate(50, 0)).toBeNull();
  });

  it("computes revenue per square meter per month", () => {
    expect(revenuePerSquareMeter(13_000, 50, 2)).toBe(130);
    expect(revenuePerSquareMeter(13_000, 0)).toBeNull();
  });

  it("computes waste rate and days inventory outstanding", () => {
    expect(wasteRate(5, 95)).toBe(5);
    expect(wasteRate(0, 0)).toBeNull();
    expect(daysInventoryOutstanding(1_000, 3_000, 30)).toBe(10);
    expect(daysInventoryOutstanding(1_000, 0, 30)).toBeNull();
  });

  it("divides safely", () => {
    expect(safeDivide(1, 0)).toBeNull();
    expect(safeDivide(9, 3)).toBe(3);
  });
});

describe("argument validation", () => {
  it("rejects negative amounts", () => {
    expect(() => grossMargin(-1, 0)).toThrow(KpiValidationError);
  });

  it("rejects non-finite amounts with an issue naming the argument", () => {
    try {
      grossMargin(Number.NaN, 0);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(KpiValidationError);
      if (err instanceof KpiValidationError) {
        expect(err.code).toBe("VALIDATION_ERROR");
        expect(err.issues[0]?.path).toBe("revenue");
      }
    }
  });
});
