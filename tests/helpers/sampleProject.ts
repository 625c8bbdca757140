import fs from "fs/promises";
import type ExcelJS from "exceljs";
import { parseProject } from "../../src/modules/validation/projectSchema";
import type { Item, Project } from "../../src/types/project";
import { withTempFile } from "../../src/utils/fs";

/**
 * Two levels, three areas. Hand-checked totals:
 *   Main Kitchen 7660 (fire suppression delivery 800 split 400/400)
 *   Bar 7400, Staff Room 1200 (level canopy commissioning 300), project 16260.
 */
export function sampleProjectInput() {
  return {
    meta: {
      projectNumber: "24017",
      projectName: "Harbour Kitchen",
      customer: "Jane Doe",
      company: "Harbour Foods Ltd",
      location: "Leeds",
      estimator: "Sam Patel",
      deliveryLocation: "Leeds",
      date: "18/10/2026",
    },
    levels: [
      {
        name: "Ground Floor",
        areas: [
          {
            name: "Main Kitchen",
            sharedCosts: {
              canopy: { delivery: 150 },
              fireSuppression: { delivery: 800, commissioning: 120 },
            },
            items: [
              {
                reference: "K1",
                model: "KVF-2400",
                configuration: "Wall",
                basePrice: 1000,
                options: {
                  fireSuppression: { basePrice: 1690, systemType: "R102", tankQuantity: 2 },
                  wallCladding: { price: 250, width: 2400, height: 2000, positions: ["rear", "left hand"] },
                },
                spec: {
                  length: 2400,
                  width: 1200,
                  height: 555,
                  sections: 2,
                  lightingType: "LED STRIP 1200",
                  extractVolume: 1.234,
                  extractStatic: "150 Pa",
                  supplyVolume: 0.8,
                  supplyStatic: 120,
                },
              },
              {
                reference: "K2",
                model: "KVI-1800",
                basePrice: 2000,
                options: {
                  fireSuppression: { basePrice: 1200 },
                  sdu: { basePrice: 450 },
                },
                spec: { extractVolume: 0.9 },
              },
            ],
          },
          {
            name: "Bar",
            options: { uvc: { price: 700 }, recoair: { model: "RAH 1.0", price: 5000 } },
            sharedCosts: { recoair: { delivery: 200 } },
            items: [{ reference: "K3", model: "UVF-1200", basePrice: 1500 }],
          },
        ],
      },
      {
        name: "First Floor",
        sharedCosts: { canopy: { commissioning: 300 } },
        areas: [{ name: "Staff Room", items: [{ reference: "K4", model: "KVF-1200", basePrice: 900 }] }],
      },
    ],
  };
}

export function sampleProject(): Project {
  return parseProject(sampleProjectInput());
}

/** The sample without its RecoAir unit, so it calls for a single quotation. */
export function canopyOnlyProject(): Project {
  const project = sampleProject();
  delete project.levels[0].areas[1].options.recoair;
  project.levels[0].areas[1].sharedCosts = {};
  return project;
}

export function makeItem(reference: string, basePrice: number, options: Item["options"] = {}, model = "KVF-1500"): Item {
  return { reference, model, basePrice, options, spec: {} };
}

export const SAMPLE_SHEETS = [
  "CANOPY - Ground Floor (1)",
  "FIRE SUPP - Ground Floor (1)",
  "SDU - Ground Floor (1) - K2",
  "CANOPY - Ground Floor (2)",
  "UV-C - Ground Floor (2)",
  "RECOAIR - Ground Floor (2)",
  "CANOPY - First Floor (3)",
];

export async function workbookBytes(workbook: ExcelJS.Workbook): Promise<Buffer> {
  return withTempFile("test.xlsx", async (filePath) => {
    await workbook.xlsx.writeFile(filePath);
    return fs.readFile(filePath);
  });
}

/** Keeps test output readable; the services log every assembled workbook. */
export function silenceConsole(): void {
  jest.spyOn(console, "log").mockImplementation(() => undefined);
  jest.spyOn(console, "warn").mockImplementation(() => undefined);
  jest.spyOn(console, "error").mockImplementation(() => undefined);
}
