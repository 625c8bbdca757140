import { Router } from "express";
import type { NextFunction, Request, Response } from "express";
import { generateCostSheet } from "../services/generation/generationService";
import { sendFailure, sendOutputFile } from "./respond";

const router = Router();

router.post("/", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const result = await generateCostSheet(req.body);
    if (!result.ok) return sendFailure(res, result.error);
    sendOutputFile(res, result.value, result.warnings);
  } catch (error) {
    next(error);
  }
});

export default router;
