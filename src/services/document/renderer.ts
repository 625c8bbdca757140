import fs from "fs";
import fsp from "fs/promises";
import Handlebars from "handlebars";
import PDFDocument from "pdfkit";
import { TemplateRenderError } from "../../utils/errors";
import { withTempFile } from "../../utils/fs";
import { formatMoney } from "../../utils/money";
import type { DocumentContext } from "./contextBuilder";
import type { TemplateStore } from "./templateStore";

export type MarkupBlock =
  | { type: "heading"; text: string }
  | { type: "subheading"; text: string }
  | { type: "paragraph"; text: string }
  | { type: "table"; header: string[]; rows: string[][] }
  | { type: "spacer" }
  | { type: "pageBreak" };

const templates = Handlebars.create();

templates.registerHelper("money", (value: unknown) => {
  if (typeof value === "number") return formatMoney(value);
  return typeof value === "string" ? value : "";
});

templates.registerHelper("hasValue", (value: unknown) => {
  return value !== null && value !== undefined && value !== "" && value !== "-";
});

// {{join list}} or {{join list " / "}}; the options hash lands in `separator` when omitted
templates.registerHelper("join", (list: unknown, separator: unknown) => {
  if (!Array.isArray(list)) return "";
  return list.map(String).join(typeof separator === "string" ? separator : ", ");
});

/** Fills a quotation template with the context. Output is markup, not HTML: nothing is escaped. */
export function fillTemplate(templateId: string, source: string, context: DocumentContext): string {
  try {
    const template = templates.compile(source, { noEscape: true, strict: false });
    return template(context);
  } catch (error) {
    throw new TemplateRenderError(templateId, error);
  }
}

function tableCells(line: string): string[] {
  const inner = line.trim().replace(/^\|/, "").replace(/\|$/, "");
  return inner.split("|").map((cell) => cell.trim());
}

/**
 * Splits quotation markup into layout blocks. `# ` and `## ` lines are
 * headings, `---` forces a new page, runs of `|` lines form a table whose
 * first row is the header, blank lines separate paragraphs.
 */
export function parseMarkup(markup: string): MarkupBlock[] {
  const blocks: MarkupBlock[] = [];
  let paragraph: string[] = [];
  let table: string[][] = [];

  const flushParagraph = () => {
    if (paragraph.length) blocks.push({ type: "paragraph", text: paragraph.join(" ") });
    paragraph = [];
  };
  const flushTable = () => {
    if (table.length) blocks.push({ type: "table", header: table[0], rows: table.slice(1) });
    table = [];
  };

  for (const raw of markup.split(/\r?\n/)) {
    const line = raw.trim();
    if (line.startsWith("|")) {
      flushParagraph();
      table.push(tableCells(line));
      continue;
    }
    flushTable();
    if (line === "") {
      flushParagraph();
      if (blocks.length && blocks[blocks.length - 1].type !== "spacer") blocks.push({ type: "spacer" });
    } else if (line === "---") {
      flushParagraph();
      blocks.push({ type: "pageBreak" });
    } else if (line.startsWith("## ")) {
      flushParagraph();
      blocks.push({ type: "subheading", text: line.slice(3).trim() });
    } else if (line.startsWith("# ")) {
      flushParagraph();
      blocks.push({ type: "heading", text: line.slice(2).trim() });
    } else {
      paragraph.push(line);
    }
  }
  flushParagraph();
  flushTable();
  while (blocks.length && blocks[blocks.length - 1].type === "spacer") blocks.pop();
  return blocks;
}

const LEFT = 50;
const TABLE_WIDTH = 512;
const PAGE_BOTTOM = 700;

function drawTable(doc: PDFKit.PDFDocument, header: string[], rows: string[][]): void {
  const columns = Math.max(header.length, ...rows.map((row) => row.length), 1);
  const colWidth = TABLE_WIDTH / columns;
  let currentY = doc.y;

  const drawRow = (cells: string[], fill: string | null, font: string) => {
    doc.fontSize(9).font(font);
    const height =
      Math.max(...cells.map((cell) => doc.heightOfString(cell, { width: colWidth - 10 })), 10) + 12;
    if (currentY + height > PAGE_BOTTOM) {
      doc.addPage();
      currentY = 50;
    }
    if (fill) doc.rect(LEFT, currentY, TABLE_WIDTH, height).fill(fill);
    doc.fillColor("#000000");
    cells.forEach((cell, idx) => {
      doc.text(cell, LEFT + idx * colWidth + 5, currentY + 6, { width: colWidth - 10 });
    });
    currentY += height;
  };

  drawRow(header, "#e0e0e0", "Helvetica-Bold");
  rows.forEach((row, index) => drawRow(row, index % 2 === 0 ? "#f9f9f9" : null, "Helvetica"));
  doc.x = LEFT;
  doc.y = currentY;
  doc.moveDown(0.5);
}

function drawBlocks(doc: PDFKit.PDFDocument, blocks: MarkupBlock[]): void {
  for (const block of blocks) {
    if (block.type !== "pageBreak" && doc.y > PAGE_BOTTOM) doc.addPage();
    switch (block.type) {
      case "heading":
        doc.fontSize(20).font("Helvetica-Bold").fillColor("#000000").text(block.text, LEFT, doc.y, { align: "center" });
        doc.moveDown(0.5);
        break;
      case "subheading":
        doc.fontSize(13).font("Helvetica-Bold").fillColor("#000000").text(block.text, LEFT, doc.y);
        doc.moveDown(0.3);
        break;
      case "paragraph":
        doc.fontSize(10).font("Helvetica").fillColor("#000000").text(block.text, LEFT, doc.y, {
          align: "justify",
          lineGap: 2,
        });
        break;
      case "table":
        drawTable(doc, block.header, block.rows);
        break;
      case "spacer":
        doc.moveDown(0.6);
        break;
      case "pageBreak":
        doc.addPage();
        break;
    }
  }
}

/** Lays markup blocks out as a PDF and returns its bytes. */
export async function layoutPdf(blocks: MarkupBlock[], title: string): Promise<Buffer> {
  return withTempFile("document.pdf", async (pdfPath) => {
    await new Promise<void>((resolve, reject) => {
      const doc = new PDFDocument({ margin: 50, info: { Title: title } });
      const writeStream = fs.createWriteStream(pdfPath);
      writeStream.on("finish", () => resolve());
      writeStream.on("error", reject);
      doc.pipe(writeStream);
      try {
        drawBlocks(doc, blocks);
      } catch (error) {
        doc.unpipe(writeStream);
        writeStream.destroy();
        reject(error);
        return;
      }
      doc.end();
    });
    return fsp.readFile(pdfPath);
  });
}

export interface RenderedDocument {
  templateId: string;
  markup: string;
  bytes: Buffer;
}

export async function renderDocument(
  store: TemplateStore,
  templateId: string,
  context: DocumentContext
): Promise<RenderedDocument> {
  const source = await store.fetch(templateId);
  const markup = fillTemplate(templateId, source.toString("utf8"), context);
  let bytes: Buffer;
  try {
    bytes = await layoutPdf(parseMarkup(markup), `${context.projectNumber} ${templateId}`);
  } catch (error) {
    throw new TemplateRenderError(templateId, error);
  }
  return { templateId, markup, bytes };
}
