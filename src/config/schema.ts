// pattern: Functional Core
import { z } from "zod";

const IglooConfigSchema = z
  .object({
    community: z.string().url(),
    community_key: z.string().min(1),
    app_id: z.string().min(1),
    app_pass: z.string().min(1),
    username: z.string().min(1),
    password: z.string().min(1),
    default_page_size: z.number().int().positive().default(20),
    max_page_size: z.number().int().positive().default(100),
    // remote per-call maximum; larger pages are assembled from several calls
    per_call_limit: z.number().int().positive().default(50),
    request_timeout_ms: z.number().int().positive().default(30000),
    // total attempts per remote call, the first one included
    max_retries: z.number().int().positive().default(3),
    initial_backoff_ms: z.number().int().nonnegative().default(500),
    max_backoff_ms: z.number().int().nonnegative().default(10000),
  })
  .superRefine((data, ctx) => {
    if (data.default_page_size > data.max_page_size) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "default_page_size must not exceed max_page_size",
        path: ["default_page_size"],
      });
    }
  });

const FetchConfigSchema = z.object({
  max_markdown_length: z.number().int().positive().default(20000),
  extract_main_content: z.boolean().default(true),
});

const AppConfigSchema = z.object({
  igloo: IglooConfigSchema,
  fetch: FetchConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type IglooConfig = z.infer<typeof IglooConfigSchema>;
export type FetchConfig = z.infer<typeof FetchConfigSchema>;

export { AppConfigSchema, IglooConfigSchema, FetchConfigSchema };
