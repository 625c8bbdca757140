import JSZip from "jszip";
import type { ProjectMeta } from "../../types/project";
import { outputFileName } from "./fileNaming";

export interface BundleEntry {
  fileName: string;
  bytes: Buffer;
}

export function bundleFileName(meta: Pick<ProjectMeta, "projectNumber" | "date" | "revision">): string {
  return outputFileName(meta, "Quotation Bundle", ".zip");
}

export async function buildBundle(entries: BundleEntry[]): Promise<Buffer> {
  const zip = new JSZip();
  for (const entry of entries) {
    zip.file(entry.fileName, entry.bytes);
  }
  return zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE" });
}
