import { z } from "zod";

const bandSchema = z.object({
  upTo: z.number().optional(),
  level: z.string().min(1)
});

const domainSchema = z.object({
  min: z.number().default(0),
  max: z.number().optional()
});

const thresholdTableSchema = z
  .object({
    id: z.string().min(1),
    description: z.string().default(""),
    levels: z.array(z.string().min(1)).min(1),
    boundary: z.enum(["inclusive", "exclusive"]).default("inclusive"),
    domain: domainSchema.default({ min: 0 }),
    reviewAbove: z.string().min(1),
    bands: z.array(bandSchema).min(1)
  })
  .superRefine((table, ctx) => {
    table.bands.forEach((band, index) => {
      if (band.upTo === undefined && index !== table.bands.length - 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["bands", index, "upTo"],
          message: "Only the last band may omit upTo."
        });
      }
    });
  });

export const thresholdDocumentSchema = z
  .object({
    version: z.literal("v1"),
    tables: z.array(thresholdTableSchema)
  })
  .superRefine((document, ctx) => {
    const seen = new Set<string>();
    document.tables.forEach((table, index) => {
      if (seen.has(table.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["tables", index, "id"],
          message: `Duplicate table id ${table.id}.`
        });
      }
      seen.add(table.id);
    });
  });

export type ThresholdDocument = z.infer<typeof thresholdDocumentSchema>;
export type ThresholdTableEntry = ThresholdDocument["tables"][number];
