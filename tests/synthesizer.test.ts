import { synthesize, writeCostSheet } from "../src/services/workbook/synthesizer";
import { parsePoolSheetName } from "../src/services/workbook/layout";
import { AreaCapacityError, PoolExhaustedError } from "../src/utils/errors";
import { makeItem, SAMPLE_SHEETS, sampleProject, silenceConsole } from "./helpers/sampleProject";

const TEMPLATE = { templatePath: null, poolSize: 3 };

beforeEach(() => silenceConsole());
afterEach(() => jest.restoreAllMocks());

describe("synthesize", () => {
  it("places one visible sheet per area kind and item SDU", async () => {
    const { workbook, sheets } = await synthesize(sampleProject(), TEMPLATE);

    expect(sheets.map((sheet) => sheet.name)).toEqual(SAMPLE_SHEETS);
    for (const name of SAMPLE_SHEETS) {
      expect(workbook.getWorksheet(name)?.state).toBe("visible");
    }
    expect(workbook.getWorksheet("Lists")?.state).toBe("hidden");
    expect(workbook.getWorksheet("ProjectData")?.state).toBe("hidden");
    expect(workbook.worksheets.filter((sheet) => parsePoolSheetName(sheet.name))).toEqual([]);
  });

  it("writes metadata, blocks and pool rows onto the canopy sheet", async () => {
    const { workbook } = await synthesize(sampleProject(), TEMPLATE);
    const sheet = workbook.getWorksheet("CANOPY - Ground Floor (1)");
    if (!sheet) throw new Error("canopy sheet missing");

    expect(sheet.getCell("C3").value).toBe("24017");
    expect(sheet.getCell("C7").value).toBe("SP");
    expect(sheet.getCell("C9").value).toBe("Ground Floor");
    expect(sheet.getCell("G9").value).toBe("Main Kitchen");
    expect(sheet.getCell("B12").value).toBe("K1");
    expect(sheet.getCell("D14").value).toBe("KVF-2400");
    expect(sheet.getCell("N12").value).toBe(1000);
    expect(sheet.getCell("P12").value).toMatchObject({ formula: "N12+Q12", result: 1000 });
    expect(sheet.getCell("C19").value).toBe("2M² (HFL)");
    expect(sheet.getCell("P19").value).toBe("2400x2000");
    expect(sheet.getCell("Q19").value).toBe("rear/left hand");
    expect(sheet.getCell("B29").value).toBe("K2");
    expect(sheet.getCell("N182").value).toBe(150);
    expect(sheet.getCell("N183").value).toBe(0);
    expect(sheet.getCell("N184").value).toMatchObject({ result: 3400 });
  });

  it("folds distributed shares into fire-suppression unit prices", async () => {
    const { workbook } = await synthesize(sampleProject(), TEMPLATE);
    const sheet = workbook.getWorksheet("FIRE SUPP - Ground Floor (1)");
    if (!sheet) throw new Error("fire suppression sheet missing");

    expect(sheet.getCell("Q12").value).toBe(400);
    expect(sheet.getCell("P12").value).toMatchObject({ formula: "N12+Q12", result: 2090 });
    expect(sheet.getCell("C17").value).toBe("2 TANK");
    expect(sheet.getCell("C34").value).toBeNull();
    expect(sheet.getCell("Q182").value).toBe(800);
    expect(sheet.getCell("N183").value).toBe(120);
    expect(sheet.getCell("N184").value).toMatchObject({ result: 3810 });
  });

  it("places sheets for a level name that truncates onto an apostrophe", async () => {
    const project = sampleProject();
    project.levels[0].name = "Ground Floor Members' Lounge";

    const { workbook, sheets } = await synthesize(project, TEMPLATE);

    expect(sheets.slice(0, 4).map((sheet) => sheet.name)).toEqual([
      "CANOPY - Ground Floor Members",
      "FIRE SUPP - Ground Floor Member",
      "SDU - Ground Floor Members' Lou",
      "CANOPY - Ground Floor Members 2",
    ]);
    expect(workbook.getWorksheet("CANOPY - Ground Floor Members")?.getCell("C9").value).toBe(
      "Ground Floor Members' Lounge"
    );
  });

  it("totals every placed sheet on JOB TOTAL", async () => {
    const { workbook } = await synthesize(sampleProject(), TEMPLATE);
    const sheet = workbook.getWorksheet("JOB TOTAL");
    if (!sheet) throw new Error("job total missing");

    expect(sheet.getCell("A4").value).toBe("CANOPY - Ground Floor (1)");
    expect(sheet.getCell("D4").value).toMatchObject({ formula: "'CANOPY - Ground Floor (1)'!N184", result: 3400 });
    expect(sheet.getCell("A11").value).toBe("GRAND TOTAL");
    expect(sheet.getCell("D11").value).toMatchObject({ formula: "SUM(D4:D10)", result: 16260 });
  });

  it("places the same project on the same sheets every time", async () => {
    const first = await synthesize(sampleProject(), TEMPLATE);
    const second = await synthesize(sampleProject(), TEMPLATE);
    expect(second.sheets).toEqual(first.sheets);
  });

  it("rejects an area with more items than a sheet holds", async () => {
    const project = sampleProject();
    project.levels[1].areas[0].items = Array.from({ length: 11 }, (_, idx) => makeItem(`S${idx + 1}`, 100));

    await expect(synthesize(project, TEMPLATE)).rejects.toBeInstanceOf(AreaCapacityError);
  });

  it("fails when the template pool runs out of a kind", async () => {
    await expect(synthesize(sampleProject(), { templatePath: null, poolSize: 2 })).rejects.toMatchObject({
      code: "POOL_EXHAUSTED",
      details: { level: "First Floor", area: "Staff Room", available: 2 },
    });
    await expect(synthesize(sampleProject(), { templatePath: null, poolSize: 2 })).rejects.toBeInstanceOf(
      PoolExhaustedError
    );
  });

  it("writes workbook bytes", async () => {
    const { bytes, summary } = await writeCostSheet(sampleProject(), TEMPLATE);
    expect(bytes.subarray(0, 2).toString("latin1")).toBe("PK");
    expect(summary.total).toBe(16260);
  });
});
