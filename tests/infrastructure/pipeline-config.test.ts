import { describe, it, expect, afterEach } from 'vitest';
import { writeFileSync, mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import {
  loadPipelineConfig,
  parseSimpleYaml,
  DEFAULT_CONFIG,
} from '../../src/infrastructure/config/pipeline-config.js';

const TMP_DIR = join(process.cwd(), '.tmp-test-config');

function writeTmpYaml(content: string): string {
  mkdirSync(TMP_DIR, { recursive: true });
  const path = join(TMP_DIR, 'pipeline.yaml');
  writeFileSync(path, content, 'utf-8');
  return path;
}

describe('parseSimpleYaml', () => {
  it('reads sections, scalars and lists', () => {
    const parsed = parseSimpleYaml(
      [
        '# comment',
        'pipeline:',
        '  dispatch_interval_ms: 250',
        'jetstream:',
        '  endpoint: "wss://jetstream.test/subscribe"',
        '  wanted_collections:',
        '    - app.bsky.feed.post',
        '    - app.bsky.feed.like',
        'websocket:',
        '  enabled: false',
      ].join('\n'),
    );

    expect(parsed).toEqual({
      pipeline: { dispatch_interval_ms: 250 },
      jetstream: {
        endpoint: 'wss://jetstream.test/subscribe',
        wanted_collections: ['app.bsky.feed.post', 'app.bsky.feed.like'],
      },
      websocket: { enabled: false },
    });
  });

  it('treats [] as an empty list', () => {
    expect(parseSimpleYaml('jetstream:\n  wanted_collections: []\n')).toEqual({
      jetstream: { wanted_collections: [] },
    });
  });
});

describe('loadPipelineConfig', () => {
  afterEach(() => {
    rmSync(TMP_DIR, { recursive: true, force: true });
  });

  it('returns defaults when file does not exist', () => {
    expect(loadPipelineConfig('/nonexistent/path.yaml')).toEqual(DEFAULT_CONFIG);
  });

  it('returns defaults for empty file', () => {
    const config = loadPipelineConfig(writeTmpYaml(''));
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.pipeline).toEqual({
      dispatch_interval_ms: 200,
      scroll_cooldown_ms: 2000,
      retention_capacity: 100,
    });
    expect(config.jetstream.wanted_collections).toEqual(['app.bsky.feed.post']);
  });

  it('overrides individual pipeline settings', () => {
    const config = loadPipelineConfig(
      writeTmpYaml('pipeline:\n  scroll_cooldown_ms: 500\n  retention_capacity: 20\n'),
    );
    expect(config.pipeline).toEqual({
      dispatch_interval_ms: 200,
      scroll_cooldown_ms: 500,
      retention_capacity: 20,
    });
  });

  it('falls back per field on invalid values', () => {
    const config = loadPipelineConfig(
      writeTmpYaml(
        'pipeline:\n  dispatch_interval_ms: fast\n  retention_capacity: 0\n' +
          'jetstream:\n  endpoint: not-a-url\n  max_retries: 3\n',
      ),
    );
    expect(config.pipeline.dispatch_interval_ms).toBe(200);
    expect(config.pipeline.retention_capacity).toBe(100);
    expect(config.jetstream.endpoint).toBe('wss://jetstream1.us-east.bsky.network/subscribe');
    expect(config.jetstream.max_retries).toBe(3);
  });

  it('an empty collection list falls back to posts', () => {
    const config = loadPipelineConfig(writeTmpYaml('jetstream:\n  wanted_collections: []\n'));
    expect(config.jetstream.wanted_collections).toEqual(['app.bsky.feed.post']);
  });

  it('parses websocket enabled=false', () => {
    const config = loadPipelineConfig(writeTmpYaml('websocket:\n  enabled: false\n'));
    expect(config.websocket.enabled).toBe(false);
  });

  it('reads the shipped config file', () => {
    const config = loadPipelineConfig(join(process.cwd(), 'config', 'pipeline.yaml'));
    expect(config).toEqual(DEFAULT_CONFIG);
  });
});
