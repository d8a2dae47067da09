export type { RandomSource } from './filler.js';

import type { ContentKind, ExcerptConfig, ObfuscationConfig, ObfuscationError, Result } from '../types/index.js';
import { CharacterClassFiller, type FillerGenerator, type RandomSource } from './filler.js';
import { obfuscateHtml } from './html.js';
import { obfuscateJson } from './json.js';

export interface ObfuscationSettings {
  filler: FillerGenerator;
  ignoreIds: readonly string[];
  metaTags: readonly string[];
  preserveTitle: boolean;
  excerpt?: ExcerptConfig;
}

export function createObfuscationSettings(config: ObfuscationConfig, random?: RandomSource): ObfuscationSettings {
  return {
    filler: new CharacterClassFiller(config.charRanges, random),
    ignoreIds: config.ignoreIds,
    metaTags: config.metaTags,
    preserveTitle: config.preserveTitle,
    excerpt: config.excerpt
  };
}

export type TransformableKind = Exclude<ContentKind, 'opaque'>;

export function isTransformable(kind: ContentKind): kind is TransformableKind {
  return kind !== 'opaque';
}

export function obfuscateBody(
  kind: TransformableKind,
  bytes: Uint8Array,
  settings: ObfuscationSettings
): Result<Buffer, ObfuscationError> {
  switch (kind) {
    case 'html':
      return obfuscateHtml(bytes, settings);
    case 'json':
      return obfuscateJson(bytes, settings);
  }
}
