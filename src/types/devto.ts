import { z } from "zod";

/** Item of GET /articles/latest. Only the fields we read are declared. */
export const DevToArticleSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  url: z.string(),
  positive_reactions_count: z.number().int(),
  published_at: z.string().datetime({ offset: true }),
  user: z.object({ name: z.string() }),
});

export const DevToPageSchema = z.array(DevToArticleSchema);

export type DevToArticle = z.infer<typeof DevToArticleSchema>;
