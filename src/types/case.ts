import { z } from "zod";
import { FormatSettingSchema, ToleranceSettingSchema } from "./config.js";

type Scalar = string | number | boolean | null;

// Node shapes are declared by hand because the schema is recursive. Keys
// holding arbitrary YAML values are optional to match zod's inference.
export interface EqualToNode {
  equal_to?: unknown;
  within?: number;
  mode?: "linear" | "percent" | "ulps" | "ms" | "seconds" | "minutes" | "hours" | "days";
  ignore_case?: boolean;
  unordered?: boolean;
  as_collection?: boolean;
}

export type ConstraintNode =
  | EqualToNode
  | { greater_than: Scalar }
  | { greater_than_or_equal: Scalar }
  | { less_than: Scalar }
  | { less_than_or_equal: Scalar }
  | { in_range: [Scalar, Scalar] }
  | { starts_with: string; ignore_case?: boolean }
  | { ends_with: string; ignore_case?: boolean }
  | { contains: string; ignore_case?: boolean }
  | { matches: string }
  | { same_path: string; ignore_case?: boolean }
  | { sub_path_of: string; ignore_case?: boolean }
  | { has_member?: unknown }
  | { one_of: unknown[] }
  | { empty: true }
  | { null: true }
  | { not: ConstraintNode }
  | { and: ConstraintNode[] }
  | { or: ConstraintNode[] }
  | { all_items: ConstraintNode }
  | { some_items: ConstraintNode }
  | { no_items: ConstraintNode }
  | { property: string; satisfies?: ConstraintNode };

const ScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const CaseOnlySchema = z.object({ ignore_case: z.boolean().optional() });

export const ConstraintNodeSchema: z.ZodType<ConstraintNode> = z.lazy(() =>
  z.union([
    z.object({
      equal_to: z.unknown(),
      within: z.number().nonnegative().optional(),
      mode: z.enum(["linear", "percent", "ulps", "ms", "seconds", "minutes", "hours", "days"]).optional(),
      ignore_case: z.boolean().optional(),
      unordered: z.boolean().optional(),
      as_collection: z.boolean().optional(),
    }).strict().refine((node) => "equal_to" in node, { message: "equal_to is required" }),
    z.object({ greater_than: ScalarSchema }).strict(),
    z.object({ greater_than_or_equal: ScalarSchema }).strict(),
    z.object({ less_than: ScalarSchema }).strict(),
    z.object({ less_than_or_equal: ScalarSchema }).strict(),
    z.object({ in_range: z.tuple([ScalarSchema, ScalarSchema]) }).strict(),
    CaseOnlySchema.extend({ starts_with: z.string() }).strict(),
    CaseOnlySchema.extend({ ends_with: z.string() }).strict(),
    CaseOnlySchema.extend({ contains: z.string() }).strict(),
    z.object({ matches: z.string() }).strict(),
    CaseOnlySchema.extend({ same_path: z.string() }).strict(),
    CaseOnlySchema.extend({ sub_path_of: z.string() }).strict(),
    z.object({ has_member: z.unknown() }).strict().refine((node) => "has_member" in node, {
      message: "has_member is required",
    }),
    z.object({ one_of: z.array(z.unknown()).min(1) }).strict(),
    z.object({ empty: z.literal(true) }).strict(),
    z.object({ null: z.literal(true) }).strict(),
    z.object({ not: ConstraintNodeSchema }).strict(),
    z.object({ and: z.array(ConstraintNodeSchema).min(2) }).strict(),
    z.object({ or: z.array(ConstraintNodeSchema).min(2) }).strict(),
    z.object({ all_items: ConstraintNodeSchema }).strict(),
    z.object({ some_items: ConstraintNodeSchema }).strict(),
    z.object({ no_items: ConstraintNodeSchema }).strict(),
    z.object({ property: z.string(), satisfies: ConstraintNodeSchema.optional() }).strict(),
  ])
);

const CaseSchema = z.object({
  name: z.string(),
  actual: z.unknown(),
  // A list is evaluated entry by entry; with `multiple` every entry is reported
  expect: z.union([ConstraintNodeSchema, z.array(ConstraintNodeSchema).min(1)]),
  multiple: z.boolean().optional(),
  message: z.string().optional(),
  skip: z.union([z.boolean(), z.string()]).optional(),
  tolerance: ToleranceSettingSchema.optional(),
}).strict();

export const CaseFileSchema = z.object({
  version: z.string(),
  name: z.string(),
  tolerance: ToleranceSettingSchema.optional(),
  format: FormatSettingSchema.optional(),
  cases: z.array(CaseSchema).min(1),
}).strict();

export type Case = z.infer<typeof CaseSchema>;
export type CaseFile = z.infer<typeof CaseFileSchema>;
