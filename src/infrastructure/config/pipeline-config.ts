import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { DEFAULT_PIPELINE_SETTINGS } from '../../application/pipeline.js';
import { DEFAULT_JETSTREAM_SETTINGS } from '../jetstream/jetstream-adapter.js';

/**
 * Defaults: 200 ms dispatch, 2 s scroll pause, 100 posts per consumer,
 * the US-East Jetstream instance, WebSocket push enabled.
 */
export const DEFAULT_CONFIG = {
  pipeline: { ...DEFAULT_PIPELINE_SETTINGS },
  jetstream: {
    ...DEFAULT_JETSTREAM_SETTINGS,
    wanted_collections: [...DEFAULT_JETSTREAM_SETTINGS.wanted_collections],
  },
  websocket: { enabled: true },
};

/** Each field falls back to its own default when missing or invalid. */
const configSchema = z.object({
  pipeline: z
    .object({
      dispatch_interval_ms: z.number().int().min(10).catch(DEFAULT_CONFIG.pipeline.dispatch_interval_ms),
      scroll_cooldown_ms: z.number().int().min(0).catch(DEFAULT_CONFIG.pipeline.scroll_cooldown_ms),
      retention_capacity: z.number().int().min(1).catch(DEFAULT_CONFIG.pipeline.retention_capacity),
    })
    .catch(DEFAULT_CONFIG.pipeline),
  jetstream: z
    .object({
      endpoint: z.string().url().catch(DEFAULT_CONFIG.jetstream.endpoint),
      wanted_collections: z
        .array(z.string().min(1))
        .min(1)
        .catch(DEFAULT_CONFIG.jetstream.wanted_collections),
      max_retries: z.number().int().min(0).catch(DEFAULT_CONFIG.jetstream.max_retries),
      base_delay_ms: z.number().int().min(1).catch(DEFAULT_CONFIG.jetstream.base_delay_ms),
      max_delay_ms: z.number().int().min(1).catch(DEFAULT_CONFIG.jetstream.max_delay_ms),
      reset_retries_min_ms: z.number().int().min(0).catch(DEFAULT_CONFIG.jetstream.reset_retries_min_ms),
    })
    .catch(DEFAULT_CONFIG.jetstream),
  websocket: z
    .object({
      enabled: z.boolean().catch(DEFAULT_CONFIG.websocket.enabled),
    })
    .catch(DEFAULT_CONFIG.websocket),
});

export type PipelineConfig = z.infer<typeof configSchema>;

function parseScalar(raw: string): unknown {
  if (raw === '[]' || raw === '') return [];
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  if (/^-?\d+(\.\d+)?$/.test(raw)) return Number(raw);
  if (raw.length >= 2 && (raw.startsWith('"') || raw.startsWith("'")) && raw.endsWith(raw[0] ?? '')) {
    return raw.slice(1, -1);
  }
  return raw;
}

/**
 * Minimal YAML reader for the flat config structure.
 *
 * Handles only the subset used in config/pipeline.yaml: top-level section
 * keys, indented `key: value` scalars, and `- item` lists under a key left
 * empty (or set to `[]`). Not a general-purpose YAML parser.
 */
export function parseSimpleYaml(content: string): Record<string, Record<string, unknown>> {
  const result: Record<string, Record<string, unknown>> = {};
  let section: Record<string, unknown> | null = null;
  let lastKey: string | null = null;

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trimEnd();
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#')) continue;

    const indented = line.startsWith(' ') || line.startsWith('\t');

    if (!indented) {
      const name = trimmed.split(':')[0]?.trim() ?? '';
      section = {};
      result[name] = section;
      lastKey = null;
      continue;
    }

    if (!section) continue;

    // List item under the most recent key. Checked before key/value so
    // items containing ':' (URLs) are not mistaken for keys.
    if (trimmed.startsWith('- ')) {
      const target = lastKey === null ? undefined : section[lastKey];
      if (Array.isArray(target)) {
        target.push(parseScalar(trimmed.slice(2).trim()));
      }
      continue;
    }

    const colonIdx = trimmed.indexOf(':');
    if (colonIdx === -1) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    section[key] = parseScalar(trimmed.slice(colonIdx + 1).trim());
    lastKey = key;
  }

  return result;
}

/**
 * Loads the pipeline configuration from YAML.
 *
 * Falls back to DEFAULT_CONFIG when the file is missing or unreadable.
 * Loaded values are merged over defaults field by field.
 */
export function loadPipelineConfig(configPath?: string): PipelineConfig {
  const filePath = configPath ?? resolve(process.cwd(), 'config', 'pipeline.yaml');

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch {
    return configSchema.parse({});
  }

  return configSchema.parse(parseSimpleYaml(content));
}
