import { describe, it, expect } from 'vitest';
import { decodeJetstreamMessage } from '../../src/infrastructure/jetstream/jetstream-decoder.js';
import { FIXED_NOW } from '../helpers.js';

const DID = 'did:plc:testauthor0001';
const clock = () => FIXED_NOW;

function commitFrame(record: unknown, overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    did: DID,
    time_us: 1_771_416_000_000_000,
    kind: 'commit',
    commit: {
      rev: '3lrev000000',
      operation: 'create',
      collection: 'app.bsky.feed.post',
      rkey: '3kpost000001',
      record,
      cid: 'bafytestcid',
      ...overrides,
    },
  });
}

function decodePost(record: unknown) {
  const result = decodeJetstreamMessage(commitFrame(record), clock);
  if (result.status !== 'decoded') {
    throw new Error(`expected decoded, got ${JSON.stringify(result)}`);
  }
  return result.event;
}

describe('decodeJetstreamMessage', () => {
  it('decodes a plain text post', () => {
    const result = decodeJetstreamMessage(
      commitFrame({ $type: 'app.bsky.feed.post', text: 'hello world', createdAt: '2026-02-18T11:59:59Z' }),
      clock,
    );

    expect(result).toEqual({
      status: 'decoded',
      event: {
        captured_at: '2026-02-18T12:00:00.000Z',
        author_did: DID,
        rkey: '3kpost000001',
        text: 'hello world',
        embed: null,
        facets: null,
      },
    });
  });

  it('fails on a frame that is not JSON', () => {
    expect(decodeJetstreamMessage('{not json', clock)).toEqual({
      status: 'failed',
      reason: 'Frame is not valid JSON',
    });
  });

  it('fails on a frame without a DID', () => {
    expect(decodeJetstreamMessage(JSON.stringify({ kind: 'commit' }), clock)).toEqual({
      status: 'failed',
      reason: 'did: Required',
    });
  });

  it('skips identity and account frames', () => {
    expect(decodeJetstreamMessage(JSON.stringify({ did: DID, kind: 'identity' }), clock))
      .toEqual({ status: 'skipped' });
    expect(decodeJetstreamMessage(JSON.stringify({ did: DID, kind: 'account' }), clock))
      .toEqual({ status: 'skipped' });
  });

  it('fails on a commit frame with no commit body', () => {
    expect(decodeJetstreamMessage(JSON.stringify({ did: DID, kind: 'commit' }), clock)).toEqual({
      status: 'failed',
      reason: 'Commit frame without commit body',
    });
  });

  it('skips deletes, updates and other collections', () => {
    expect(decodeJetstreamMessage(commitFrame(undefined, { operation: 'delete' }), clock).status)
      .toBe('skipped');
    expect(decodeJetstreamMessage(commitFrame({ text: 'x' }, { operation: 'update' }), clock).status)
      .toBe('skipped');
    expect(
      decodeJetstreamMessage(commitFrame({ subject: 'x' }, { collection: 'app.bsky.feed.like' }), clock).status,
    ).toBe('skipped');
  });

  it('fails on a post record without text', () => {
    expect(decodeJetstreamMessage(commitFrame({ createdAt: '2026-02-18T12:00:00Z' }), clock)).toEqual({
      status: 'failed',
      reason: 'record: text: Required',
    });
  });

  it('keeps image captions', () => {
    const event = decodePost({
      text: 'look',
      embed: {
        $type: 'app.bsky.embed.images',
        images: [{ alt: 'a sleepy cat', image: { ref: 'blob' } }, { image: { ref: 'blob2' } }],
      },
    });
    expect(event.embed).toEqual({ kind: 'images', images: [{ alt: 'a sleepy cat' }, { alt: '' }] });
  });

  it('drops an image set with no images', () => {
    const event = decodePost({ text: 'look', embed: { $type: 'app.bsky.embed.images', images: [] } });
    expect(event.embed).toBeNull();
  });

  it('decodes an external link card', () => {
    const event = decodePost({
      text: 'read this',
      embed: {
        $type: 'app.bsky.embed.external',
        external: { uri: 'https://example.com/article', title: 'An article' },
      },
    });
    expect(event.embed).toEqual({
      kind: 'external',
      uri: 'https://example.com/article',
      title: 'An article',
      description: '',
    });
  });

  it('decodes a video embed', () => {
    const event = decodePost({ text: 'watch', embed: { $type: 'app.bsky.embed.video', video: {} } });
    expect(event.embed).toEqual({ kind: 'video' });
  });

  it('ignores embed types it does not know', () => {
    const event = decodePost({
      text: 'quoting',
      embed: { $type: 'app.bsky.embed.record', record: { uri: 'at://x', cid: 'y' } },
    });
    expect(event.embed).toBeNull();
  });

  it('fails the record on a malformed known embed', () => {
    const result = decodeJetstreamMessage(
      commitFrame({ text: 'broken', embed: { $type: 'app.bsky.embed.external' } }),
      clock,
    );
    expect(result).toEqual({ status: 'failed', reason: 'embed: external: Required' });
  });

  it('emits one annotation per recognised facet feature', () => {
    const event = decodePost({
      text: '@friend #cats https://example.com',
      facets: [
        {
          index: { byteStart: 0, byteEnd: 7 },
          features: [{ $type: 'app.bsky.richtext.facet#mention', did: 'did:plc:friend' }],
        },
        {
          index: { byteStart: 8, byteEnd: 13 },
          features: [
            { $type: 'app.bsky.richtext.facet#tag', tag: 'cats' },
            { $type: 'app.bsky.richtext.facet#sparkle' },
          ],
        },
        {
          index: { byteStart: 14, byteEnd: 33 },
          features: [{ $type: 'app.bsky.richtext.facet#link', uri: 'https://example.com' }],
        },
      ],
    });

    expect(event.facets).toEqual([
      { byte_start: 0, byte_end: 7, feature: { kind: 'mention', did: 'did:plc:friend' } },
      { byte_start: 8, byte_end: 13, feature: { kind: 'tag', tag: 'cats' } },
      { byte_start: 14, byte_end: 33, feature: { kind: 'link', uri: 'https://example.com' } },
    ]);
  });

  it('keeps an empty facet list distinct from none', () => {
    expect(decodePost({ text: 'plain', facets: [] }).facets).toEqual([]);
  });

  it('fails the record on a malformed mention', () => {
    const result = decodeJetstreamMessage(
      commitFrame({
        text: '@someone',
        facets: [
          { index: { byteStart: 0, byteEnd: 8 }, features: [{ $type: 'app.bsky.richtext.facet#mention' }] },
        ],
      }),
      clock,
    );
    expect(result).toEqual({ status: 'failed', reason: 'facet mention: did: Required' });
  });
});
