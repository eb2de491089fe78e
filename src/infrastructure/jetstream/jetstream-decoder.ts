import type { ZodError } from 'zod';
import type { PostEmbed, PostFacet, FacetFeature } from '../../domain/index.js';
import type { DecodeResult } from '../ingestion/index.js';
import {
  POST_COLLECTION,
  EMBED_IMAGES,
  EMBED_EXTERNAL,
  EMBED_VIDEO,
  FACET_MENTION,
  FACET_LINK,
  FACET_TAG,
  jetstreamMessageSchema,
  postRecordSchema,
  imagesEmbedSchema,
  externalEmbedSchema,
  mentionFeatureSchema,
  linkFeatureSchema,
  tagFeatureSchema,
} from './jetstream-schema.js';

type Parsed<T> = { ok: true; value: T } | { ok: false; reason: string };

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Attachment descriptor. Unknown embed types (quotes, record-with-media)
 * and image sets with no images carry nothing worth showing → null.
 */
function decodeEmbed(embed: { $type: string } | undefined): Parsed<PostEmbed | null> {
  if (embed === undefined) return { ok: true, value: null };

  switch (embed.$type) {
    case EMBED_IMAGES: {
      const parsed = imagesEmbedSchema.safeParse(embed);
      if (!parsed.success) return { ok: false, reason: `embed: ${describeIssues(parsed.error)}` };
      if (parsed.data.images.length === 0) return { ok: true, value: null };
      return {
        ok: true,
        value: { kind: 'images', images: parsed.data.images.map((img) => ({ alt: img.alt })) },
      };
    }
    case EMBED_EXTERNAL: {
      const parsed = externalEmbedSchema.safeParse(embed);
      if (!parsed.success) return { ok: false, reason: `embed: ${describeIssues(parsed.error)}` };
      const { uri, title, description } = parsed.data.external;
      return { ok: true, value: { kind: 'external', uri, title, description } };
    }
    case EMBED_VIDEO:
      return { ok: true, value: { kind: 'video' } };
    default:
      return { ok: true, value: null };
  }
}

function decodeFeature(feature: { $type: string }): Parsed<FacetFeature | null> {
  switch (feature.$type) {
    case FACET_MENTION: {
      const parsed = mentionFeatureSchema.safeParse(feature);
      if (!parsed.success) return { ok: false, reason: `facet mention: ${describeIssues(parsed.error)}` };
      return { ok: true, value: { kind: 'mention', did: parsed.data.did } };
    }
    case FACET_LINK: {
      const parsed = linkFeatureSchema.safeParse(feature);
      if (!parsed.success) return { ok: false, reason: `facet link: ${describeIssues(parsed.error)}` };
      return { ok: true, value: { kind: 'link', uri: parsed.data.uri } };
    }
    case FACET_TAG: {
      const parsed = tagFeatureSchema.safeParse(feature);
      if (!parsed.success) return { ok: false, reason: `facet tag: ${describeIssues(parsed.error)}` };
      return { ok: true, value: { kind: 'tag', tag: parsed.data.tag } };
    }
    default:
      return { ok: true, value: null };
  }
}

/**
 * Decodes one raw Jetstream text frame.
 *
 * Only post creations become events. Everything else that is well formed
 * (identity/account frames, deletes, updates, other collections) is
 * `skipped`; anything malformed is `failed` with a reason.
 *
 * `captured_at` is the local wall-clock time of decode, not the record's
 * own `createdAt`. The clock is injectable for tests.
 */
export function decodeJetstreamMessage(
  raw: string,
  nowFn: () => number = Date.now,
): DecodeResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { status: 'failed', reason: 'Frame is not valid JSON' };
  }

  const envelope = jetstreamMessageSchema.safeParse(json);
  if (!envelope.success) {
    return { status: 'failed', reason: describeIssues(envelope.error) };
  }

  const { did, kind, commit } = envelope.data;
  if (kind !== 'commit') return { status: 'skipped' };
  if (commit === undefined) {
    return { status: 'failed', reason: 'Commit frame without commit body' };
  }
  if (commit.operation !== 'create' || commit.collection !== POST_COLLECTION) {
    return { status: 'skipped' };
  }

  const record = postRecordSchema.safeParse(commit.record);
  if (!record.success) {
    return { status: 'failed', reason: `record: ${describeIssues(record.error)}` };
  }

  const embed = decodeEmbed(record.data.embed);
  if (!embed.ok) return { status: 'failed', reason: embed.reason };

  let facets: PostFacet[] | null = null;
  if (record.data.facets !== undefined) {
    facets = [];
    for (const facet of record.data.facets) {
      // One annotation per recognised feature; unknown features are ignored.
      for (const feature of facet.features) {
        const decoded = decodeFeature(feature);
        if (!decoded.ok) return { status: 'failed', reason: decoded.reason };
        if (decoded.value === null) continue;
        facets.push({
          byte_start: facet.index.byteStart,
          byte_end: facet.index.byteEnd,
          feature: decoded.value,
        });
      }
    }
  }

  return {
    status: 'decoded',
    event: {
      captured_at: new Date(nowFn()).toISOString(),
      author_did: did,
      rkey: commit.rkey,
      text: record.data.text,
      embed: embed.value,
      facets,
    },
  };
}
