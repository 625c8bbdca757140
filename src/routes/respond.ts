import type { Response } from "express";
import { STATUS_BY_CODE } from "../utils/errors";
import type { GenerationResult, OutputFile } from "../services/generation/generationService";

type Failure = Extract<GenerationResult<unknown>, { ok: false }>["error"];

export function sendFailure(res: Response, error: Failure): void {
  res.status(STATUS_BY_CODE[error.code]).json({ error });
}

/** Streams generated bytes as a download named by the output naming contract. */
export function sendOutputFile(res: Response, output: OutputFile, warnings: string[]): void {
  res.attachment(output.fileName);
  res.type(output.contentType);
  res.setHeader("X-Generation-Warnings", String(warnings.length));
  res.status(200).send(output.bytes);
}
