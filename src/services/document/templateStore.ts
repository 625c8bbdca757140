import fs from "fs/promises";
import path from "path";
import { config } from "../../config";
import { TemplateNotFoundError } from "../../utils/errors";

/** Where quotation templates come from. The core only needs bytes for an id. */
export interface TemplateStore {
  fetch(templateId: string): Promise<Buffer>;
}

const TEMPLATE_ID = /^[a-z0-9][a-z0-9-]*$/;

/** `<dir>/<id>.hbs` on local disk. */
export class FileTemplateStore implements TemplateStore {
  constructor(private readonly dir: string = config.templateDir) {}

  async fetch(templateId: string): Promise<Buffer> {
    if (!TEMPLATE_ID.test(templateId)) throw new TemplateNotFoundError(templateId);
    try {
      return await fs.readFile(path.join(this.dir, `${templateId}.hbs`));
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        throw new TemplateNotFoundError(templateId);
      }
      throw error;
    }
  }
}

export class MemoryTemplateStore implements TemplateStore {
  private readonly templates: Map<string, Buffer>;

  constructor(templates: Record<string, string>) {
    this.templates = new Map(Object.entries(templates).map(([id, body]) => [id, Buffer.from(body, "utf8")]));
  }

  async fetch(templateId: string): Promise<Buffer> {
    const body = this.templates.get(templateId);
    if (!body) throw new TemplateNotFoundError(templateId);
    return body;
  }
}
