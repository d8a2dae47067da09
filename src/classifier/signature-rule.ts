import type { HeaderValue, SignatureDefinition } from '../types/index.js';
import type { ClassificationRule } from './types.js';

type Matcher = (value: string) => boolean;

function compileMatcher(signature: SignatureDefinition): Matcher {
  switch (signature.type) {
    case 'exact': {
      if (signature.caseSensitive) {
        return value => value === signature.pattern;
      }
      const expected = signature.pattern.toLowerCase();
      return value => value.toLowerCase() === expected;
    }

    case 'regex': {
      const regex = new RegExp(signature.pattern, signature.caseSensitive ? undefined : 'i');
      return value => regex.test(value);
    }

    case 'substring': {
      if (signature.caseSensitive) {
        return value => value.includes(signature.pattern);
      }
      const needle = signature.pattern.toLowerCase();
      return value => value.toLowerCase().includes(needle);
    }
  }
}

function headerValues(value: HeaderValue | undefined): readonly string[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

export function signatureRule(signature: SignatureDefinition, header: string): ClassificationRule {
  const matches = compileMatcher(signature);
  const headerName = header.toLowerCase();

  return {
    name: `signature:${signature.name}`,
    evaluate(request) {
      const hit = headerValues(request.headers[headerName]).some(matches);
      if (!hit) return null;

      return {
        verdict: 'obfuscate',
        reason: 'matched-signature',
        rule: signature.name
      };
    }
  };
}
