import JSZip from "jszip";
import { buildBundle, bundleFileName } from "../src/services/output/bundle";
import { nextRevision, outputFileName } from "../src/services/output/fileNaming";

const META = { projectNumber: "24017", date: "18/10/2026", revision: "" };

describe("output file names", () => {
  it("omits the revision suffix before the first revision", () => {
    expect(outputFileName(META, "Cost Sheet", ".xlsx")).toBe("24017 Cost Sheet 18102026.xlsx");
  });

  it("appends the revision letter once there is one", () => {
    expect(outputFileName({ ...META, revision: "B" }, "Canopy Quotation", "pdf")).toBe(
      "24017 Canopy Quotation 18102026 Rev B.pdf"
    );
    expect(bundleFileName({ ...META, revision: "A" })).toBe("24017 Quotation Bundle 18102026 Rev A.zip");
  });

  it("keeps path separators out of the project number", () => {
    expect(outputFileName({ ...META, projectNumber: "24/017" }, "Cost Sheet", ".xlsx")).toBe(
      "24-017 Cost Sheet 18102026.xlsx"
    );
  });
});

describe("nextRevision", () => {
  it("counts A to Z and then AA onwards", () => {
    expect(["", "A", "B", "Z", "AZ", "ZZ"].map(nextRevision)).toEqual(["A", "B", "C", "AA", "BA", "AAA"]);
  });

  it("rejects anything that is not letters", () => {
    expect(() => nextRevision("A1")).toThrow("Invalid revision 'A1'");
  });
});

describe("buildBundle", () => {
  it("zips every document under its own name", async () => {
    const bytes = await buildBundle([
      { fileName: "a.pdf", bytes: Buffer.from("first") },
      { fileName: "b.pdf", bytes: Buffer.from("second") },
    ]);

    const zip = await JSZip.loadAsync(bytes);
    expect(Object.keys(zip.files)).toEqual(["a.pdf", "b.pdf"]);
    expect(await zip.file("b.pdf")?.async("string")).toBe("second");
  });
});
