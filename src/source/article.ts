import { z } from 'zod';

const RenderedSchema = z.object({ rendered: z.string() }).passthrough();

const FeaturedMediaSchema = z
  .object({ source_url: z.string().optional() })
  .passthrough();

/**
 * A post as returned by `GET /wp-json/wp/v2/posts?_embed=1`.
 * Only the fields the sync reads are checked; everything else passes through.
 */
export const WpPostSchema = z
  .object({
    id: z.number().int(),
    title: RenderedSchema,
    content: RenderedSchema,
    excerpt: RenderedSchema,
    slug: z.string(),
    link: z.string(),
    date: z.string(),
    modified: z.string(),
    _embedded: z
      .object({
        'wp:featuredmedia': z.array(FeaturedMediaSchema).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

/**
 * The response body is only checked for being a list; each entry is checked
 * against {@link WpPostSchema} on its own so one bad post is skipped alone.
 */
export const WpPostListSchema = z.array(z.unknown());

export type RawArticle = z.infer<typeof WpPostSchema>;

/**
 * Document shape written to the Appwrite collection.
 */
export interface NormalizedArticle {
  wp_id: string;
  title: string;
  content: string;
  excerpt: string;
  slug: string;
  link: string;
  published_date: string;
  modified_date: string;
  featured_image: string | null;
}

export function documentKey(wpId: string | number): string {
  return `wp_${wpId}`;
}
