import { z } from "zod";

// Default floating-point tolerance (timespan tolerances only apply to dates)
export const ToleranceSettingSchema = z.object({
  amount: z.number().nonnegative(),
  mode: z.enum(["linear", "percent", "ulps"]).default("linear"),
}).strict();

export const FormatSettingSchema = z.object({
  max_string_length: z.number().int().positive().optional(),
  max_items: z.number().int().positive().optional(),
}).strict();

const LogSettingSchema = z.object({
  level: z.enum(["silent", "error", "warn", "info", "debug"]).default("info"),
}).strict();

export const ProjectConfigSchema = z.object({
  version: z.string().default("1.0"),
  tolerance: ToleranceSettingSchema.optional(),
  format: FormatSettingSchema.optional(),
  log: LogSettingSchema.optional(),
}).strict();

// Type exports
export type ToleranceSetting = z.infer<typeof ToleranceSettingSchema>;
export type FormatSetting = z.infer<typeof FormatSettingSchema>;
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
