import { z } from "zod";
import type { Project } from "../../types/project";
import { ValidationError, type ValidationIssue } from "../../utils/errors";

const money = z.number().finite().nonnegative();
const optionalNumber = z.number().finite().nullable().optional();
const optionalText = z.union([z.string(), z.number().finite()]).nullable().optional();

const poolSchema = z.object({
  delivery: money.optional(),
  commissioning: money.optional(),
});

const sharedCostsSchema = z
  .object({
    canopy: poolSchema.optional(),
    fireSuppression: poolSchema.optional(),
    recoair: poolSchema.optional(),
  })
  .default({});

const itemSchema = z.object({
  reference: z.string().trim().min(1, "reference code is required"),
  model: z.string().trim().min(1, "model is required"),
  configuration: z.string().optional(),
  basePrice: money,
  options: z
    .object({
      fireSuppression: z
        .object({
          basePrice: money,
          systemType: z.string().optional(),
          tankQuantity: z.number().int().nonnegative().nullable().default(null),
        })
        .optional(),
      sdu: z.object({ basePrice: money }).optional(),
      wallCladding: z
        .object({
          price: money,
          width: z.number().finite().nullable().default(null),
          height: z.number().finite().nullable().default(null),
          positions: z.array(z.string().trim().min(1)).default([]),
        })
        .optional(),
    })
    .default({}),
  spec: z
    .object({
      length: optionalNumber,
      width: optionalNumber,
      height: optionalNumber,
      sections: optionalNumber,
      lightingType: z.string().nullable().optional(),
      extractVolume: optionalNumber,
      extractStatic: optionalText,
      supplyVolume: optionalNumber,
      supplyStatic: optionalText,
      cwsCapacity: optionalText,
      hwsRequirement: optionalText,
      hwStorage: optionalText,
    })
    .default({}),
});

const areaSchema = z.object({
  name: z.string().trim().min(1, "area name is required"),
  options: z
    .object({
      uvc: z.object({ price: money }).optional(),
      recoair: z.object({ model: z.string().optional(), price: money }).optional(),
      reactaway: z.object({ price: money }).optional(),
    })
    .default({}),
  items: z.array(itemSchema).default([]),
  sharedCosts: sharedCostsSchema,
});

const levelSchema = z.object({
  name: z.string().trim().min(1, "level name is required"),
  areas: z.array(areaSchema).default([]),
  sharedCosts: sharedCostsSchema,
});

export const projectSchema = z
  .object({
    meta: z.object({
      projectNumber: z.string().trim().min(1, "project number is required"),
      projectName: z.string().trim().min(1, "project name is required"),
      customer: z.string().trim().min(1, "customer is required"),
      company: z.string().optional(),
      address: z.string().optional(),
      location: z.string().optional(),
      estimator: z.string().optional(),
      salesContact: z.string().optional(),
      deliveryLocation: z.string().optional(),
      date: z.string().regex(/^\d{2}\/\d{2}\/\d{4}$/, "date must be DD/MM/YYYY"),
      revision: z.string().regex(/^[A-Z]*$/, "revision must be empty or capital letters").default(""),
    }),
    levels: z.array(levelSchema).min(1, "a project needs at least one level"),
  })
  .superRefine((project, ctx) => {
    const seen = new Map<string, string>();
    project.levels.forEach((level, levelIdx) => {
      level.areas.forEach((area, areaIdx) => {
        area.items.forEach((item, itemIdx) => {
          const key = item.reference.trim().toUpperCase();
          const first = seen.get(key);
          if (first !== undefined) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: ["levels", levelIdx, "areas", areaIdx, "items", itemIdx, "reference"],
              message: `reference '${item.reference}' is already used at ${first}`,
            });
          } else {
            seen.set(key, `${level.name} / ${area.name}`);
          }
        });
      });
    });
  });

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }));
}

/** Parses untrusted input into a Project, or throws a ValidationError listing every issue. */
export function parseProject(input: unknown): Project {
  const result = projectSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(toIssues(result.error));
  }
  return result.data;
}
