import { describe, expect, it } from 'vitest';
import { parseConfig } from '../config/index.js';
import { createObfuscationSettings, isTransformable, obfuscateBody } from './index.js';

const config = parseConfig({
  upstream: { baseUrl: 'http://origin.test' },
  obfuscation: { excerpt: { anchorId: 'lead', length: 5 } }
});

const settings = createObfuscationSettings(config.obfuscation, () => 0);

function bodyText(kind: 'html' | 'json', source: string): string {
  const result = obfuscateBody(kind, Buffer.from(source, 'utf-8'), settings);
  if (!result.ok) throw result.error;
  return result.value.toString('utf-8');
}

describe('obfuscateBody', () => {
  it('dispatches HTML with the configured excerpt', () => {
    expect(bodyText('html', '<p>Hello</p><p id="lead">Hello world</p>')).toBe(
      '<p>Aaaaa</p><p id="lead">Hello aaaaa</p>'
    );
  });

  it('dispatches JSON', () => {
    expect(bodyText('json', '{"name":"Hello"}')).toBe('{"name":"Aaaaa"}');
  });
});

describe('isTransformable', () => {
  it('only accepts HTML and JSON', () => {
    expect(isTransformable('html')).toBe(true);
    expect(isTransformable('json')).toBe(true);
    expect(isTransformable('opaque')).toBe(false);
  });
});
