import { buildContext } from "../src/services/document/contextBuilder";
import { aggregate } from "../src/services/pricing/aggregation";
import { sampleProject } from "./helpers/sampleProject";

describe("buildContext", () => {
  const project = sampleProject();
  const summary = aggregate(project);

  it("formats the letter fields", () => {
    const context = buildContext(project, summary);

    expect(context).toMatchObject({
      clientName: "Jane Doe",
      company: "Harbour Foods Ltd",
      address: "-",
      estimatorInitials: "SP",
      date: "18 October 2026",
      quoteReference: "24017/10/26",
      dearLine: "Jane Doe,",
      subjectLine: "Harbour Kitchen, Leeds",
      grandTotal: "£16,260.00",
      totalItems: 4,
    });
  });

  it("formats item rows for display", () => {
    const [k1, k2] = buildContext(project, summary).items;

    expect(k1).toMatchObject({
      reference: "K1",
      configuration: "Wall",
      lightingType: "LED STRIP",
      extractVolume: "1.2",
      extractStatic: "150",
      supplyVolume: "0.8",
      supplyStatic: "120",
      price: "£3,340.00",
      levelAreaName: "Ground Floor - Main Kitchen",
    });
    expect(k2).toMatchObject({ configuration: "-", supplyVolume: "-", hasSdu: true, price: "£4,050.00" });
  });

  it("lists cladding and fire suppression per item", () => {
    const context = buildContext(project, summary);

    expect(context.wallCladdingItems).toEqual([
      {
        itemNumber: "K1",
        description: "Cladding to rear and left hand walls",
        dimensions: "2400X2000",
        positions: "rear/left hand",
        levelAreaName: "Ground Floor - Main Kitchen",
      },
    ]);
    expect(context.fireSuppressionItems.map((item) => [item.itemNumber, item.systemType, item.tankQuantity])).toEqual([
      ["K1", "R102", "2"],
      ["K2", "-", "TBD"],
    ]);
  });

  it("labels explicit costs and summarises kinds that occur", () => {
    const context = buildContext(project, summary);

    expect(context.areas[0].explicitCosts).toEqual([
      { label: "Canopies delivery", amount: "£150.00" },
      { label: "Fire suppression commissioning", amount: "£120.00" },
    ]);
    expect(context.kindSummary.map((entry) => entry.kind)).toEqual([
      "canopy",
      "cladding",
      "fireSuppression",
      "sdu",
      "uvc",
      "recoair",
    ]);
    expect(context.hasRecoair).toBe(true);
    expect(context.hasReactaway).toBe(false);
    expect(context.areas[1].recoairModel).toBe("RAH 1.0");
  });

  it("gives equal contexts for equal inputs", () => {
    expect(buildContext(project, summary)).toEqual(buildContext(project, summary));
  });
});
