import { z } from 'zod';
import defaultSignatures from '../data/crawler-signatures.json' with { type: 'json' };
import defaultCharRanges from '../data/char-ranges.json' with { type: 'json' };

const singleChar = z
  .string()
  .refine(value => Array.from(value).length === 1, { message: 'must be a single character' });

const charRangeSchema = z
  .object({
    start: singleChar,
    end: singleChar,
    targetStart: singleChar.optional(),
    targetEnd: singleChar.optional(),
    comment: z.string().optional()
  })
  .refine(range => codePoint(range.start) <= codePoint(range.end), {
    message: 'start must not come after end'
  })
  .transform(range => ({
    ...range,
    targetStart: range.targetStart ?? range.start,
    targetEnd: range.targetEnd ?? range.end
  }))
  .refine(range => codePoint(range.targetStart) <= codePoint(range.targetEnd), {
    message: 'targetStart must not come after targetEnd'
  });

const signatureSchema = z
  .object({
    name: z.string().min(1),
    pattern: z.string().min(1),
    type: z.enum(['exact', 'substring', 'regex']).default('substring'),
    caseSensitive: z.boolean().default(false),
    documentation: z.string().optional()
  })
  .superRefine((signature, ctx) => {
    if (signature.type !== 'regex') return;
    try {
      new RegExp(signature.pattern);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['pattern'],
        message: `invalid regular expression: ${error instanceof Error ? error.message : String(error)}`
      });
    }
  });

const DEFAULT_SIGNATURES = z.array(signatureSchema).parse(defaultSignatures);

const DEFAULT_CHAR_RANGES = z.array(charRangeSchema).parse(defaultCharRanges);

const upstreamUrl = z
  .string({ required_error: 'upstream base URL is required' })
  .url()
  .refine(value => /^https?:$/.test(new URL(value).protocol), {
    message: 'only http: and https: upstreams are supported'
  });

export const ConfigSchema = z.object({
  server: z
    .object({
      host: z.string().min(1).default('0.0.0.0'),
      port: z.coerce.number().int().min(0).max(65535).default(8080)
    })
    .default({}),
  upstream: z.object({
    baseUrl: upstreamUrl,
    timeoutMs: z.coerce.number().int().positive().default(60_000),
    maxBodyBytes: z.coerce.number().int().positive().default(5 * 1024 * 1024),
    connections: z.coerce.number().int().positive().default(128)
  }),
  classifier: z
    .object({
      header: z
        .string()
        .min(1)
        .default('user-agent')
        .transform(name => name.toLowerCase()),
      override: z
        .object({
          param: z.string().min(1).default('demo'),
          value: z.string().min(1).default('1')
        })
        .default({}),
      signatures: z.array(signatureSchema).default(DEFAULT_SIGNATURES)
    })
    .default({}),
  obfuscation: z
    .object({
      ignoreIds: z.array(z.string().min(1)).default([]),
      metaTags: z.array(z.string().min(1)).default([]),
      preserveTitle: z.boolean().default(false),
      excerpt: z
        .object({
          anchorId: z.string().min(1),
          length: z.coerce.number().int().min(0).default(0)
        })
        .optional(),
      charRanges: z.array(charRangeSchema).default(DEFAULT_CHAR_RANGES)
    })
    .default({}),
  errorPageStyle: z.enum(['plain', 'nginx']).default('plain')
});

function codePoint(char: string): number {
  return char.codePointAt(0) ?? 0;
}
