import request from "supertest";
import app from "../src/app";
import {
  createProject,
  findProjectById,
  listProjects,
  updateProject,
} from "../src/modules/storage/projectRepository";
import { createProjectLog, listProjectLogs } from "../src/modules/storage/projectLogRepository";
import { generateCostSheet } from "../src/services/generation/generationService";
import { sampleProject, sampleProjectInput, silenceConsole } from "./helpers/sampleProject";

jest.mock("../src/modules/storage/projectRepository", () => ({
  listProjects: jest.fn(),
  findProjectById: jest.fn(),
  createProject: jest.fn(),
  updateProject: jest.fn(),
}));

jest.mock("../src/modules/storage/projectLogRepository", () => ({
  createProjectLog: jest.fn(),
  listProjectLogs: jest.fn(),
}));

const PROJECT_ID = "64b7f0c2a1b2c3d4e5f60718";
const STAMP = new Date("2026-10-18T09:00:00.000Z");

function stored() {
  return { id: PROJECT_ID, project: sampleProject(), createdAt: STAMP, updatedAt: STAMP };
}

async function costSheetBytes(): Promise<Buffer> {
  const result = await generateCostSheet(sampleProjectInput());
  if (!result.ok) throw new Error(result.error.message);
  return result.value.bytes;
}

beforeEach(() => {
  silenceConsole();
  jest.mocked(createProjectLog).mockResolvedValue(undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
  jest.clearAllMocks();
});

describe("POST /api/pricing/summary", () => {
  it("prices the posted project", async () => {
    const res = await request(app).post("/api/pricing/summary").send(sampleProjectInput());

    expect(res.status).toBe(200);
    expect(res.body.summary.total).toBe(16260);
    expect(res.body.warnings).toEqual([]);
  });

  it("rejects an invalid project with its issues", async () => {
    const res = await request(app)
      .post("/api/pricing/summary")
      .send({ meta: { projectNumber: "1", projectName: "X", date: "18/10/2026" }, levels: [] });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe("VALIDATION_FAILED");
  });
});

describe("POST /api/cost-sheets", () => {
  it("returns the workbook as a named attachment", async () => {
    const res = await request(app).post("/api/cost-sheets").send(sampleProjectInput());

    expect(res.status).toBe(200);
    expect(res.headers["content-disposition"]).toBe('attachment; filename="24017 Cost Sheet 18102026.xlsx"');
    expect(res.headers["content-type"]).toBe(
      "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet"
    );
    expect(res.headers["x-generation-warnings"]).toBe("0");
  });
});

describe("quotation routes", () => {
  it("require an uploaded workbook", async () => {
    const res = await request(app).post("/api/quotations");

    expect(res.status).toBe(400);
    expect(res.body.error.details.issues).toEqual([
      { path: "workbook", message: "A cost-sheet workbook upload is required" },
    ]);
  });

  it("preview the uploaded workbook", async () => {
    const res = await request(app)
      .post("/api/quotations/preview")
      .attach("workbook", await costSheetBytes(), "cost.xlsx");

    expect(res.status).toBe(200);
    expect(res.body.summary.total).toBe(16260);
    expect(res.body.documents).toEqual(["canopy-quotation", "recoair-quotation"]);
  });

  it("report an unreadable upload", async () => {
    const res = await request(app)
      .post("/api/quotations/preview")
      .attach("workbook", Buffer.from("not a workbook"), "cost.xlsx");

    expect(res.status).toBe(422);
    expect(res.body.error.code).toBe("WORKBOOK_UNREADABLE");
  });
});

describe("project routes", () => {
  it("list stored projects", async () => {
    jest.mocked(listProjects).mockResolvedValue([
      { id: PROJECT_ID, projectNumber: "24017", projectName: "Harbour Kitchen", revision: "", updatedAt: STAMP },
    ]);

    const res = await request(app).get("/api/projects");

    expect(res.status).toBe(200);
    expect(res.body).toEqual([
      {
        id: PROJECT_ID,
        projectNumber: "24017",
        projectName: "Harbour Kitchen",
        revision: "",
        updatedAt: "2026-10-18T09:00:00.000Z",
      },
    ]);
  });

  it("create a project and log it", async () => {
    jest.mocked(createProject).mockResolvedValue(stored());

    const res = await request(app).post("/api/projects").send(sampleProjectInput());

    expect(res.status).toBe(201);
    expect(res.body.id).toBe(PROJECT_ID);
    expect(jest.mocked(createProject).mock.calls[0][0].meta.projectNumber).toBe("24017");
    expect(createProjectLog).toHaveBeenCalledWith({
      projectId: PROJECT_ID,
      operation: "create",
      message: "Project saved: 24017 Harbour Kitchen.",
    });
  });

  it("answer 404 for an unknown project", async () => {
    jest.mocked(findProjectById).mockResolvedValue(null);

    const res = await request(app).get(`/api/projects/${PROJECT_ID}`);

    expect(res.status).toBe(404);
    expect(res.body.error.code).toBe("NOT_FOUND");
  });

  it("update a project tree", async () => {
    jest.mocked(updateProject).mockResolvedValue(stored());

    const res = await request(app).put(`/api/projects/${PROJECT_ID}`).send(sampleProjectInput());

    expect(res.status).toBe(200);
    expect(createProjectLog).toHaveBeenCalledWith({
      projectId: PROJECT_ID,
      operation: "update",
      message: "Project tree updated.",
    });
  });

  it("return the project log", async () => {
    jest.mocked(listProjectLogs).mockResolvedValue([
      { operation: "create", level: "info", message: "Project saved: 24017 Harbour Kitchen.", createdAt: STAMP },
    ]);

    const res = await request(app).get(`/api/projects/${PROJECT_ID}/logs?limit=10`);

    expect(res.status).toBe(200);
    expect(listProjectLogs).toHaveBeenCalledWith({ projectId: PROJECT_ID, limit: 10 });
    expect(res.body[0].operation).toBe("create");
  });

  it("generate a cost sheet for a stored project and log the outcome", async () => {
    jest.mocked(findProjectById).mockResolvedValue(stored());

    const res = await request(app).post(`/api/projects/${PROJECT_ID}/cost-sheet`);

    expect(res.status).toBe(200);
    expect(res.headers["content-disposition"]).toBe('attachment; filename="24017 Cost Sheet 18102026.xlsx"');
    expect(createProjectLog).toHaveBeenCalledWith({
      projectId: PROJECT_ID,
      operation: "cost-sheet",
      level: "info",
      message: "Cost sheet generated: 24017 Cost Sheet 18102026.xlsx.",
    });
  });
});

describe("unknown routes", () => {
  it("answer with a JSON 404", async () => {
    const res = await request(app).get("/api/nothing-here");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: { code: "NOT_FOUND", message: "Route not found", details: {} } });
  });
});
