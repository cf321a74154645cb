import { z, type ZodIssue } from "zod";

export const DEFAULT_MAX_DEPTH = 64;
export const DEFAULT_IGNORE_GLOBS = ["**/node_modules/**", "**/.git/**"];

export const HistoryConfigSchema = z
  .object({
    limit: z.number().int().positive().default(10),
    timeout_ms: z.number().int().positive().default(10_000),
  })
  .strict();

export const ReportConfigSchema = z
  .object({
    history_limit: z.number().int().nonnegative().default(5),
  })
  .strict();

export const LoggingConfigSchema = z
  .object({
    file: z.string().min(1).optional(),
  })
  .strict();

export const ProjectConfigSchema = z
  .object({
    max_depth: z.number().int().positive().max(1024).default(DEFAULT_MAX_DEPTH),
    ignore: z.array(z.string().min(1)).default(DEFAULT_IGNORE_GLOBS),
    policy: z.string().min(1).optional(),
    history: HistoryConfigSchema.default({}),
    report: ReportConfigSchema.default({}),
    logging: LoggingConfigSchema.default({}),
  })
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type HistoryConfig = z.infer<typeof HistoryConfigSchema>;

export function defaultProjectConfig(): ProjectConfig {
  return ProjectConfigSchema.parse({});
}

export function formatConfigIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

    if (issue.code === "invalid_type") {
      return `${location}: Expected ${issue.expected}, received ${issue.received}`;
    }
    if (issue.code === "invalid_enum_value") {
      const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
      return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
    }
    if (issue.code === "unrecognized_keys") {
      return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
    }

    return `${location}: ${issue.message}`;
  });
}
