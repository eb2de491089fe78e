import type { PostEvent, PostEmbed } from '../domain/index.js';

export interface FacetCounts {
  mentions: number;
  links: number;
  tags: number;
}

/** Display hints pushed alongside each post. */
export interface PostSummary {
  author_label: string;
  facet_counts: FacetCounts;
  embed_kind: PostEmbed['kind'] | null;
  image_count: number;
}

export function countFacets(event: PostEvent): FacetCounts {
  const counts: FacetCounts = { mentions: 0, links: 0, tags: 0 };
  for (const facet of event.facets ?? []) {
    switch (facet.feature.kind) {
      case 'mention':
        counts.mentions++;
        break;
      case 'link':
        counts.links++;
        break;
      case 'tag':
        counts.tags++;
        break;
    }
  }
  return counts;
}

/**
 * Compact author label: first 8 chars of the DID and of the record key,
 * or just the record key when the DID is already short.
 */
export function shortAuthorLabel(event: PostEvent): string {
  if (event.author_did.length > 12) {
    return `${event.author_did.slice(0, 8)}...${event.rkey.slice(0, 8)}`;
  }
  return event.rkey;
}

export function summarizePost(event: PostEvent): PostSummary {
  return {
    author_label: shortAuthorLabel(event),
    facet_counts: countFacets(event),
    embed_kind: event.embed?.kind ?? null,
    image_count: event.embed?.kind === 'images' ? event.embed.images.length : 0,
  };
}
