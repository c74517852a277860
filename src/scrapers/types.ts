import { z } from 'zod'

// Blogger v3 responses. Only the fields the crawl reads are required;
// everything else the API sends is kept untouched.

export const BlogSchema = z.object({
  id: z.string(),
}).passthrough()

export const BlogPostSchema = z.object({
  content: z.string(),
  id: z.string().optional(),
  title: z.string().optional(),
  url: z.string().optional(),
}).passthrough()

export const PostPageSchema = z.object({
  items: z.array(BlogPostSchema),
  nextPageToken: z.string().optional(),
}).passthrough()

export type BlogPost = z.infer<typeof BlogPostSchema>
export type PostPage = z.infer<typeof PostPageSchema>

export interface BloggerCredentials {
  apiKey: string
}

export type LinkResolution =
  | { success: true; link: string; url: string }
  | { success: false; link: string; error: Error }
