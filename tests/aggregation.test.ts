import { createFeatureFlags } from "../src/config/features";
import { aggregate, allAreaSummaries } from "../src/services/pricing/aggregation";
import type { Project } from "../src/types/project";
import { toMinor } from "../src/utils/money";
import { makeItem, sampleProject } from "./helpers/sampleProject";

function project(levels: Project["levels"]): Project {
  return {
    meta: { projectNumber: "1", projectName: "Test", customer: "Test", date: "01/01/2026", revision: "" },
    levels,
  };
}

describe("aggregate", () => {
  it("rolls the sample project up area by area", () => {
    const summary = aggregate(sampleProject());
    const [kitchen, bar, staff] = allAreaSummaries(summary);

    expect(kitchen.subtotals).toEqual({ mainUnits: 3000, cladding: 250, fireSuppression: 3690, ancillary: 450 });
    expect(kitchen.explicitCosts).toEqual([
      { kind: "canopy", pool: "delivery", scope: "area", amount: 150 },
      { kind: "fireSuppression", pool: "commissioning", scope: "area", amount: 120 },
    ]);
    expect(kitchen.total).toBe(7660);
    expect(kitchen.items.map((item) => item.total)).toEqual([3340, 4050]);

    expect(bar.areaLines.map((line) => [line.kind, line.price])).toEqual([
      ["uvc", 700],
      ["recoair", 5000],
    ]);
    expect(bar.total).toBe(7400);

    expect(staff.explicitCosts).toEqual([{ kind: "canopy", pool: "commissioning", scope: "level", amount: 300 }]);
    expect(staff.total).toBe(1200);

    expect(summary.levels.map((level) => level.total)).toEqual([15060, 1200]);
    expect(summary.total).toBe(16260);
    expect(summary.anomalies).toEqual([]);
  });

  it("counts and totals every kind across the project", () => {
    const { byKind } = aggregate(sampleProject());

    expect(byKind.canopy).toEqual({ count: 4, total: 5400 });
    expect(byKind.cladding).toEqual({ count: 1, total: 250 });
    expect(byKind.fireSuppression).toEqual({ count: 2, total: 3690 });
    expect(byKind.sdu).toEqual({ count: 1, total: 450 });
    expect(byKind.recoair).toEqual({ count: 1, total: 5000 });
    expect(byKind.reactaway).toEqual({ count: 0, total: 0 });
  });

  it("keeps the project total equal to the sum of area totals", () => {
    const summary = aggregate(sampleProject());
    const areaMinor = allAreaSummaries(summary).reduce((sum, area) => sum + toMinor(area.total), 0);
    expect(toMinor(summary.total)).toBe(areaMinor);
  });

  it("splits a level pool across absorbers in every area of the level", () => {
    const fs = { basePrice: 100, tankQuantity: null };
    const summary = aggregate(
      project([
        {
          name: "L1",
          sharedCosts: { fireSuppression: { delivery: 90 } },
          areas: [
            { name: "A", options: {}, sharedCosts: {}, items: [makeItem("K1", 0, { fireSuppression: fs })] },
            { name: "B", options: {}, sharedCosts: {}, items: [makeItem("K2", 0, { fireSuppression: fs })] },
          ],
        },
      ])
    );

    const prices = allAreaSummaries(summary).map((area) => area.items[0].lines[1].price);
    expect(prices).toEqual([145, 145]);
    expect(summary.total).toBe(290);
  });

  it("reports a pool that nothing can absorb and leaves it out", () => {
    const summary = aggregate(
      project([
        {
          name: "L1",
          sharedCosts: {},
          areas: [
            {
              name: "Prep",
              options: {},
              sharedCosts: { fireSuppression: { delivery: 100 } },
              items: [makeItem("K1", 500)],
            },
          ],
        },
      ])
    );

    expect(summary.total).toBe(500);
    expect(summary.anomalies).toEqual([
      {
        severity: "warning",
        rule: "pool-without-absorber",
        message: "fireSuppression delivery pool of 100 has no fireSuppression unit to absorb it and was treated as zero",
        level: "L1",
        area: "Prep",
      },
    ]);
  });

  it("puts a level's explicit pool on the first area that hosts the kind", () => {
    const summary = aggregate(
      project([
        {
          name: "L1",
          sharedCosts: { canopy: { delivery: 300 } },
          areas: [
            { name: "Plant", options: { uvc: { price: 50 } }, sharedCosts: {}, items: [] },
            { name: "Kitchen", options: {}, sharedCosts: {}, items: [makeItem("K1", 1000)] },
          ],
        },
      ])
    );

    const [plant, kitchen] = allAreaSummaries(summary);
    expect(plant.explicitCosts).toEqual([]);
    expect(kitchen.explicitCosts).toEqual([{ kind: "canopy", pool: "delivery", scope: "level", amount: 300 }]);
    expect(summary.total).toBe(1350);
  });

  it("notes pools of a switched-off kind without warning", () => {
    const features = createFeatureFlags(["recoair"]);
    const summary = aggregate(sampleProject(), { features });

    expect(summary.anomalies).toEqual([
      {
        severity: "info",
        rule: "kind-disabled",
        message: "recoair delivery pool of 200 ignored because recoair is switched off",
        level: "Ground Floor",
        area: "Bar",
      },
    ]);
    expect(summary.byKind.recoair.count).toBe(0);
    expect(summary.total).toBe(16260 - 5000 - 200);
  });
});
