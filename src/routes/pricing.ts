import { Router } from "express";
import type { NextFunction, Request, Response } from "express";
import { pricePreview } from "../services/generation/generationService";
import { sendFailure } from "./respond";

const router = Router();

router.post("/summary", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const result = await pricePreview(req.body);
    if (!result.ok) return sendFailure(res, result.error);
    res.status(200).json({ summary: result.value, warnings: result.warnings });
  } catch (error) {
    next(error);
  }
});

export default router;
