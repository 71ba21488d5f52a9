import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import type { NginxRtmpStats, NginxRtmpStream } from './types.js';

export class StatsParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StatsParseError';
  }
}

// ─── Schema ───
// Tag values arrive as raw text (parseTagValue is off) so stream keys like
// "0123" survive; numeric fields are converted here.

const uint = z.string().trim().regex(/^\d+$/, 'expected an unsigned integer').transform(Number);

const float = z
  .string()
  .trim()
  .refine((v) => v !== '' && Number.isFinite(Number(v)), 'expected a number')
  .transform(Number);

/** An element written as `<x></x>` or `<x/>` parses to ''. */
function element<T extends z.ZodTypeAny>(schema: T, { required = true } = {}) {
  return z.preprocess((v) => (v === '' || (v === undefined && !required) ? {} : v), schema);
}

function optionalText<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((v) => (v === '' ? undefined : v), schema.optional());
}

const videoSchema = z
  .object({
    width: uint,
    height: uint,
    frame_rate: uint,
    codec: z.string(),
    profile: optionalText(z.string()),
    compat: optionalText(uint),
    level: optionalText(float),
  })
  .transform(({ frame_rate, ...rest }) => ({ ...rest, frameRate: frame_rate }));

const audioSchema = z
  .object({
    codec: z.string(),
    profile: optionalText(z.string()),
    channels: optionalText(uint),
    sample_rate: optionalText(uint),
  })
  .transform(({ sample_rate, ...rest }) => ({ ...rest, sampleRate: sample_rate }));

const streamSchema = z
  .object({
    name: z.string(),
    bw_video: uint,
    meta: z.object({ video: videoSchema, audio: audioSchema }).optional(),
  })
  .transform((s) => ({ name: s.name, bwVideo: s.bw_video, meta: s.meta }));

const applicationSchema = z.object({
  name: z.string(),
  // Applications that only play recorded files have no <live> block.
  live: element(z.object({ stream: z.array(streamSchema).default([]) }), { required: false }),
});

const statsSchema = z.object({
  server: element(z.object({ application: z.array(applicationSchema).default([]) })),
});

// ─── Parsing ───

const parser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  isArray: (_tagName, jPath) => jPath.endsWith('.server.application') || jPath.endsWith('.live.stream'),
});

/**
 * Parse an nginx-rtmp `stat` page. The root element's name is not checked,
 * only that it holds a `server` block.
 */
export function parseNginxStats(xml: string): NginxRtmpStats {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    throw new StatsParseError(`Malformed XML at line ${valid.err.line}: ${valid.err.msg}`);
  }

  const doc: unknown = parser.parse(xml);
  const roots = typeof doc === 'object' && doc !== null ? Object.values(doc) : [];
  if (roots.length !== 1) {
    throw new StatsParseError(`Expected a single root element, found ${roots.length}`);
  }

  const result = statsSchema.safeParse(roots[0]);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`);
    throw new StatsParseError(`Unexpected stats document: ${issues.join('; ')}`);
  }
  return result.data;
}

/** Last match wins if the server ever reports the same key twice. */
export function selectStream(stats: NginxRtmpStats, application: string, key: string): NginxRtmpStream | null {
  const matches = stats.server.application
    .filter((app) => app.name === application)
    .flatMap((app) => app.live.stream)
    .filter((stream) => stream.name === key);
  return matches.at(-1) ?? null;
}

export function toKbps(bwVideo: number): number {
  return Math.floor(bwVideo / 1024);
}
