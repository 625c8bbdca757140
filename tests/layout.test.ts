import {
  blockRow,
  kindOfPlacedSheet,
  parsePoolSheetName,
  placedSheetName,
  sheetRef,
  uniqueSheetName,
} from "../src/services/workbook/layout";

describe("sheet naming", () => {
  it("names area and item sheets by level and area number", () => {
    expect(placedSheetName("canopy", "Ground Floor", 1)).toBe("CANOPY - Ground Floor (1)");
    expect(placedSheetName("sdu", "Ground Floor", 1, "K2")).toBe("SDU - Ground Floor (1) - K2");
  });

  it("drops characters a sheet name cannot hold", () => {
    expect(placedSheetName("uvc", "Basement/Plant: Room", 4)).toBe("UV-C - Basement Plant Room (4)");
  });

  it("truncates to 31 characters and de-duplicates inside the limit", () => {
    const name = placedSheetName("canopy", "Mezzanine Level Kitchens", 12, "K-101");
    expect(name).toBe("CANOPY - Mezzanine Level Kitche");

    const taken = new Set<string>();
    expect(uniqueSheetName(name, taken)).toBe(name);
    expect(uniqueSheetName(name, taken)).toBe("CANOPY - Mezzanine Level Kitc 2");
    expect(uniqueSheetName(name.toLowerCase(), taken)).toBe("canopy - mezzanine level kitc 3");
  });

  it("never leaves an apostrophe at either end after truncating", () => {
    expect(placedSheetName("canopy", "Ground Floor Members' Lounge", 1)).toBe("CANOPY - Ground Floor Members");
    expect(placedSheetName("uvc", "'Chef's Table'", 2)).toBe("UV-C - 'Chef's Table' (2)");

    const name = "CANOPY - Ground Floor Member' A";
    const taken = new Set<string>([name.toUpperCase()]);
    expect(uniqueSheetName(name, taken)).toBe("CANOPY - Ground Floor Member 2");
  });

  it("recognises pool and placed sheets", () => {
    expect(parsePoolSheetName("FIRE SUPP (12)")).toEqual({ kind: "fireSuppression", index: 12 });
    expect(parsePoolSheetName("Summary (1)")).toBeNull();
    expect(kindOfPlacedSheet("RECOAIR - Ground Floor (2)")).toBe("recoair");
    expect(kindOfPlacedSheet("JOB TOTAL")).toBeNull();
  });

  it("quotes sheet references", () => {
    expect(sheetRef("Chef's Bar", "N184")).toBe("'Chef''s Bar'!N184");
  });

  it("spaces item blocks 17 rows apart", () => {
    expect([0, 1, 9].map(blockRow)).toEqual([14, 31, 167]);
  });
});
