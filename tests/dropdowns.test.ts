import fs from "fs/promises";
import { loadDropdownLists } from "../src/services/workbook/dropdowns";
import { withTempFile } from "../src/utils/fs";

const CUSTOM_LISTS = {
  lighting: ["PANEL LIGHT"],
  specialWorks: ["CUT OUT"],
  configuration: ["Wall"],
  model: ["KVF"],
  wallCladding: ["2M² (HFL)"],
  fireSuppressionSystem: ["R102"],
  tank: ["1 TANK"],
};

describe("loadDropdownLists", () => {
  it("reads another file even after the bundled lists are cached", async () => {
    const bundled = loadDropdownLists();

    const custom = await withTempFile("lists.json", async (filePath) => {
      await fs.writeFile(filePath, JSON.stringify(CUSTOM_LISTS));
      return loadDropdownLists(filePath);
    });

    expect(custom.lighting).toEqual(["PANEL LIGHT"]);
    expect(loadDropdownLists()).toBe(bundled);
    expect(bundled.lighting[0]).toBe("LED STRIP L6 Inc DALI");
  });

  it("rejects a file missing a vocabulary", async () => {
    const { tank: _tank, ...partial } = CUSTOM_LISTS;
    await expect(
      withTempFile("lists.json", async (filePath) => {
        await fs.writeFile(filePath, JSON.stringify(partial));
        return loadDropdownLists(filePath);
      })
    ).rejects.toThrow();
  });
});
