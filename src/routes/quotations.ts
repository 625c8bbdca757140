import { Router } from "express";
import type { NextFunction, Request, Response } from "express";
import multer from "multer";
import { config } from "../config";
import { generateQuotation, previewQuotation } from "../services/generation/generationService";
import { ValidationError } from "../utils/errors";
import { sendFailure, sendOutputFile } from "./respond";

const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: config.maxFileSize },
});

const workbookUpload = upload.single("workbook");

const router = Router();

function uploadedWorkbook(req: Request): Buffer {
  const file = req.file;
  if (!file) {
    throw new ValidationError([{ path: "workbook", message: "A cost-sheet workbook upload is required" }]);
  }
  return file.buffer;
}

router.post("/", workbookUpload, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const result = await generateQuotation(uploadedWorkbook(req));
    if (!result.ok) return sendFailure(res, result.error);
    res.setHeader("X-Quotation-Revision", result.value.project.meta.revision);
    sendOutputFile(res, result.value, result.warnings);
  } catch (error) {
    next(error);
  }
});

router.post("/preview", workbookUpload, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const result = await previewQuotation(uploadedWorkbook(req));
    if (!result.ok) return sendFailure(res, result.error);
    res.status(200).json({ ...result.value, warnings: result.warnings });
  } catch (error) {
    next(error);
  }
});

export default router;
