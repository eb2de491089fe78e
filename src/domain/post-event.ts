/**
 * Core domain types for a firehose post as it flows through the pipeline.
 *
 * A PostEvent is built once, at decode time, and is never mutated after.
 * Every consumer that retains it holds the same object.
 */

/** One image of an image-set attachment. Only the caption survives decode. */
export interface PostImage {
  readonly alt: string;
}

/** Attachment descriptor. `kind` discriminates the three supported shapes. */
export type PostEmbed =
  | { readonly kind: 'images'; readonly images: readonly PostImage[] }
  | {
      readonly kind: 'external';
      readonly uri: string;
      readonly title: string;
      readonly description: string;
    }
  | { readonly kind: 'video' };

export type FacetFeature =
  | { readonly kind: 'mention'; readonly did: string }
  | { readonly kind: 'link'; readonly uri: string }
  | { readonly kind: 'tag'; readonly tag: string };

/**
 * Inline annotation over the post text.
 * `[byte_start, byte_end)` indexes the UTF-8 bytes of `text`, not JS string units.
 */
export interface PostFacet {
  readonly byte_start: number;
  readonly byte_end: number;
  readonly feature: FacetFeature;
}

export interface PostEvent {
  readonly captured_at: string; // ISO-8601
  readonly author_did: string;
  readonly rkey: string;
  readonly text: string;
  readonly embed: PostEmbed | null;
  readonly facets: readonly PostFacet[] | null;
}
