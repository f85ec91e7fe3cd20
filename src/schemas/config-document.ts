import { z } from "zod";

/** A class or type reference, written as `{ "class": "<name>" }`. */
export const ClassRefSchema = z.object({ class: z.string().min(1) }).strict();

export type ClassRef = z.infer<typeof ClassRefSchema>;

export const ConfigDocumentValueSchema = z.union([
  z.string(),
  z.number().finite(),
  z.boolean(),
  ClassRefSchema,
]);

export type ConfigDocumentValue = z.infer<typeof ConfigDocumentValueSchema>;

/**
 * Plain-JSON form of a stage configuration: a flat object of key → value.
 *
 * z.record assigns parsed entries onto a plain object, which drops a
 * "__proto__" key, so such a document is rejected before it gets there.
 */
export const ConfigDocumentSchema = z
  .unknown()
  .superRefine((raw, ctx) => {
    if (typeof raw === "object" && raw !== null && Object.hasOwn(raw, "__proto__")) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["__proto__"],
        message: "Key '__proto__' is not supported in configuration files",
      });
    }
  })
  .pipe(z.record(z.string(), ConfigDocumentValueSchema));

export type ConfigDocument = z.infer<typeof ConfigDocumentSchema>;
