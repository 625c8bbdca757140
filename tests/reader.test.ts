import { readCostSheet } from "../src/services/workbook/reader";
import { synthesize, writeCostSheet } from "../src/services/workbook/synthesizer";
import { WorkbookReadError } from "../src/utils/errors";
import type { Project } from "../src/types/project";
import { makeItem, sampleProject, silenceConsole, workbookBytes } from "./helpers/sampleProject";

const TEMPLATE = { templatePath: null, poolSize: 3 };

beforeEach(() => silenceConsole());
afterEach(() => jest.restoreAllMocks());

function itemShapes(project: Project) {
  return project.levels.flatMap((level) =>
    level.areas.flatMap((area) =>
      area.items.map((item) => ({
        reference: item.reference,
        model: item.model,
        flags: Object.keys(item.options).sort(),
      }))
    )
  );
}

function areaShapes(project: Project) {
  return project.levels.flatMap((level) =>
    level.areas.map((area) => ({ level: level.name, area: area.name, flags: Object.keys(area.options).sort() }))
  );
}

/** A cost sheet as another tool would hand it over: no ProjectData sheet. */
async function foreignWorkbook(project: Project): Promise<Buffer> {
  const { workbook } = await synthesize(project, TEMPLATE);
  const data = workbook.getWorksheet("ProjectData");
  if (data) workbook.removeWorksheet(data.id);
  return workbookBytes(workbook);
}

describe("readCostSheet", () => {
  it("round-trips references, models and flags through the stored flag table", async () => {
    const original = sampleProject();
    const { bytes } = await writeCostSheet(original, TEMPLATE);

    const { project, summary, report } = readCostSheet(bytes);

    expect(report.flagSource).toBe("projectData");
    expect(itemShapes(project)).toEqual(itemShapes(original));
    expect(areaShapes(project)).toEqual(areaShapes(original));
    expect(project.meta).toMatchObject({ projectNumber: "24017", customer: "Jane Doe", date: "18/10/2026", revision: "" });
    expect(summary.total).toBe(16260);
    expect(report).toMatchObject({ skippedSheets: [], unmatchedReferences: [], warnings: [] });
  });

  it("reads prices and display fields back from the cells", async () => {
    const { bytes } = await writeCostSheet(sampleProject(), TEMPLATE);
    const { project } = readCostSheet(bytes);
    const [k1, k2] = project.levels[0].areas[0].items;

    expect(k1.basePrice).toBe(1000);
    expect(k1.configuration).toBe("Wall");
    expect(k1.spec).toMatchObject({ length: 2400, lightingType: "LED STRIP 1200", extractStatic: "150 Pa", supplyStatic: 120 });
    expect(k1.options.wallCladding).toEqual({ price: 250, width: 2400, height: 2000, positions: ["rear", "left hand"] });
    expect(k1.options.fireSuppression).toEqual({ basePrice: 1690, systemType: "R102", tankQuantity: 2 });
    expect(k2.options.fireSuppression).toEqual({ basePrice: 1200, tankQuantity: null });
    expect(k2.spec.height).toBeNull();
    expect(project.levels[0].areas[1].options.recoair).toEqual({ price: 5000, model: "RAH 1.0" });
  });

  it("infers flags and pools from the sheets of a foreign workbook", async () => {
    const original = sampleProject();
    const bytes = await foreignWorkbook(original);

    const { project, summary, report } = readCostSheet(bytes);

    expect(report.flagSource).toBe("inferred");
    expect(itemShapes(project)).toEqual(itemShapes(original));
    expect(areaShapes(project)).toEqual(areaShapes(original));
    expect(project.levels[0].areas[0].sharedCosts).toEqual({
      canopy: { delivery: 150 },
      fireSuppression: { commissioning: 120, delivery: 800 },
    });
    expect(project.levels[1].areas[0].sharedCosts).toEqual({ canopy: { commissioning: 300 } });
    expect(summary.total).toBe(16260);
    expect(report.warnings).toEqual([]);
  });

  it("reports a stored flag with no sheet behind it", async () => {
    const { workbook } = await synthesize(sampleProject(), TEMPLATE);
    const sdu = workbook.getWorksheet("SDU - Ground Floor (1) - K2");
    if (sdu) workbook.removeWorksheet(sdu.id);

    const { project, report } = readCostSheet(await workbookBytes(workbook));

    expect(project.levels[0].areas[0].items[1].options.sdu).toEqual({ basePrice: 0 });
    expect(report.warnings).toContain("Stored flags give item 'K2' sdu but its sheets do not show it");
    expect(report.warnings).toContain("JOB TOTAL shows 16260 but the sheets add up to 15810");
  });

  it("keeps references apart that only differ in punctuation", async () => {
    const project: Project = {
      meta: sampleProject().meta,
      levels: [
        {
          name: "Ground Floor",
          sharedCosts: {},
          areas: [
            {
              name: "Servery",
              options: {},
              sharedCosts: {},
              items: [
                makeItem("1.11", 1000),
                makeItem("11.1", 2000, { fireSuppression: { basePrice: 500, tankQuantity: null } }),
              ],
            },
          ],
        },
      ],
    };
    const priced = (read: Project) =>
      read.levels[0].areas[0].items.map((item) => [item.reference, item.basePrice, Object.keys(item.options)]);

    const stored = readCostSheet((await writeCostSheet(project, TEMPLATE)).bytes);
    expect(priced(stored.project)).toEqual([
      ["1.11", 1000, []],
      ["11.1", 2000, ["fireSuppression"]],
    ]);
    expect(stored.summary.total).toBe(3500);
    expect(stored.report.warnings).toEqual([]);

    const inferred = readCostSheet(await foreignWorkbook(project));
    expect(itemShapes(inferred.project)).toEqual(itemShapes(project));
    expect(inferred.summary.total).toBe(3500);
  });

  it("joins a reference the user extended on the sheet", async () => {
    const { workbook } = await synthesize(sampleProject(), TEMPLATE);
    const canopy = workbook.getWorksheet("CANOPY - Ground Floor (1)");
    if (canopy) canopy.getCell("B12").value = "K1 rev";

    const { project, summary, report } = readCostSheet(await workbookBytes(workbook));

    const k1 = project.levels[0].areas[0].items[0];
    expect(k1.reference).toBe("K1");
    expect(k1.basePrice).toBe(1000);
    expect(report.unmatchedReferences).toEqual([]);
    expect(summary.total).toBe(16260);
  });

  it("takes a level name edited on the sheet over the stored one", async () => {
    const { workbook } = await synthesize(sampleProject(), TEMPLATE);
    for (const name of ["CANOPY - Ground Floor (1)", "FIRE SUPP - Ground Floor (1)", "SDU - Ground Floor (1) - K2"]) {
      const sheet = workbook.getWorksheet(name);
      if (sheet) sheet.getCell("C9").value = "Lower Ground";
    }

    const { project, summary } = readCostSheet(await workbookBytes(workbook));

    expect(project.levels.map((level) => level.name)).toEqual(["Lower Ground", "First Floor"]);
    expect(summary.total).toBe(16260);
  });

  it("skips sheets it cannot place and says why", async () => {
    const { workbook } = await synthesize(sampleProject(), TEMPLATE);
    const uvc = workbook.getWorksheet("UV-C - Ground Floor (2)");
    if (uvc) uvc.getCell("C9").value = null;
    const staff = workbook.getWorksheet("CANOPY - First Floor (3)");
    if (staff) {
      staff.name = "CANOPY - Annex (9)";
      staff.getCell("C9").value = "Annex";
      staff.getCell("G9").value = "Store";
    }

    const { report } = readCostSheet(await workbookBytes(workbook));

    expect(report.skippedSheets).toEqual([
      { sheet: "UV-C - Ground Floor (2)", reason: "level or area cell is blank" },
      { sheet: "CANOPY - Annex (9)", reason: "sheet does not belong to any known area" },
    ]);
  });

  it("rejects bytes that hold no cost sheet", () => {
    expect(() => readCostSheet(Buffer.from("plainly not a workbook"))).toThrow(WorkbookReadError);
  });
});
