import { z } from "zod";

export const CountValueSchema = z.union([z.string(), z.number()]);

export const PostRecordSchema = z
  .object({
    text: z.string(),
    likes: CountValueSchema,
    comments: CountValueSchema,
    shares: CountValueSchema,
    images: z.array(z.string()).readonly(),
    videos: z.array(z.string()).readonly(),
    comment_texts: z.array(z.string()).readonly(),
  })
  .readonly();
export type PostRecord = z.infer<typeof PostRecordSchema>;

export const PostsDocumentSchema = z.object({
  company_name: z.string(),
  timestamp: z.string().regex(/^\d{8}_\d{6}$/),
  source_url: z.string(),
  post_count: z.number().int().nonnegative(),
  posts: z.array(PostRecordSchema),
});
export type PostsDocument = z.infer<typeof PostsDocumentSchema>;

export const WindowSizeSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

export const ScrapeConfigSchema = z.object({
  email: z.string().min(1, "email is required"),
  password: z.string().min(1, "password is required"),
  headless: z.boolean(),
  slowMo: z.number().nonnegative(),
  windowSize: WindowSizeSchema,
  numScrolls: z.number().int().nonnegative(),
  scrollPauseMs: z.number().nonnegative(),
  maxComments: z.number().int().nonnegative(),
  idleScrollLimit: z.number().int().nonnegative(),
  authTimeoutMs: z.number().int().positive(),
  commentWaitMs: z.number().nonnegative(),
  feedWaitMs: z.number().int().nonnegative(),
  companyUrl: z.string().url(),
  companyName: z.string().min(1),
  outputDir: z.string().min(1),
});
export type ScrapeConfig = Readonly<z.infer<typeof ScrapeConfigSchema>>;

export interface Credentials {
  email: string;
  password: string;
}
