import express, { NextFunction, Request, Response } from "express";
import cors from "cors";
import multer from "multer";
import projectsRouter from "./routes/projects";
import pricingRouter from "./routes/pricing";
import costSheetsRouter from "./routes/costSheets";
import quotationsRouter from "./routes/quotations";
import { AppError, toAppError } from "./utils/errors";

const app = express();

app.use(cors());
app.use(express.json({ limit: "5mb" }));
app.use(express.urlencoded({ extended: true }));

app.use("/api/projects", projectsRouter);
app.use("/api/pricing", pricingRouter);
app.use("/api/cost-sheets", costSheetsRouter);
app.use("/api/quotations", quotationsRouter);

app.use((_req, res) => {
  res.status(404).json({ error: { code: "NOT_FOUND", message: "Route not found", details: {} } });
});

app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
  if (err instanceof multer.MulterError) {
    res.status(400).json({ error: { code: "VALIDATION_FAILED", message: err.message, details: { field: err.field } } });
    return;
  }
  const appError = err instanceof AppError ? err : toAppError(err);
  if (appError.status >= 500) {
    console.error("[App] request failed", { code: appError.code, message: appError.message });
  }
  res.status(appError.status).json({ error: appError.toJSON() });
});

export default app;
