import { z } from 'zod';

export const POST_COLLECTION = 'app.bsky.feed.post';

export const EMBED_IMAGES = 'app.bsky.embed.images';
export const EMBED_EXTERNAL = 'app.bsky.embed.external';
export const EMBED_VIDEO = 'app.bsky.embed.video';

export const FACET_MENTION = 'app.bsky.richtext.facet#mention';
export const FACET_LINK = 'app.bsky.richtext.facet#link';
export const FACET_TAG = 'app.bsky.richtext.facet#tag';

/**
 * Outer Jetstream frame. `kind` is one of commit / identity / account;
 * only commits carry a `commit` object.
 */
export const jetstreamMessageSchema = z.object({
  did: z.string().min(1),
  time_us: z.number().int().optional(),
  kind: z.string(),
  commit: z
    .object({
      rev: z.string().optional(),
      operation: z.string(),
      collection: z.string(),
      rkey: z.string().min(1),
      record: z.unknown().optional(),
      cid: z.string().optional(),
    })
    .optional(),
});

export type JetstreamMessage = z.infer<typeof jetstreamMessageSchema>;

/** Any `$type`-tagged object; the specific shape is checked per type. */
const typedObjectSchema = z.object({ $type: z.string() }).passthrough();

export const facetSchema = z.object({
  index: z.object({
    byteStart: z.number().int().min(0),
    byteEnd: z.number().int().min(0),
  }),
  features: z.array(typedObjectSchema),
});

/** An `app.bsky.feed.post` record. Fields the pipeline ignores pass through. */
export const postRecordSchema = z.object({
  text: z.string(),
  embed: typedObjectSchema.optional(),
  facets: z.array(facetSchema).optional(),
});

export const imagesEmbedSchema = z.object({
  images: z.array(z.object({ alt: z.string().default('') }).passthrough()),
});

export const externalEmbedSchema = z.object({
  external: z.object({
    uri: z.string(),
    title: z.string().default(''),
    description: z.string().default(''),
  }),
});

export const mentionFeatureSchema = z.object({ did: z.string().min(1) });
export const linkFeatureSchema = z.object({ uri: z.string().min(1) });
export const tagFeatureSchema = z.object({ tag: z.string() });
