import { ObfuscationError, err, ok, type Result } from '../types/index.js';
import type { FillerGenerator } from './filler.js';

type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export interface JsonObfuscationOptions {
  filler: FillerGenerator;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

function parseJson(text: string): Result<JsonValue, ObfuscationError> {
  try {
    const value: JsonValue = JSON.parse(text);
    return ok(value);
  } catch (error) {
    return err(new ObfuscationError('PARSE_FAILED', 'Body is not valid JSON', { cause: error }));
  }
}

// Keys, key order and array lengths are kept; only scalar leaves change
function obfuscateValue(value: JsonValue, filler: FillerGenerator): JsonValue {
  if (value === null || typeof value === 'boolean') return value;
  if (typeof value === 'string') return filler.text(value);
  if (typeof value === 'number') return filler.number(value);

  if (Array.isArray(value)) {
    return value.map(item => obfuscateValue(item, filler));
  }

  // fromEntries defines own properties, so a "__proto__" key stays a key
  return Object.fromEntries(
    Object.entries(value).map(([key, child]): [string, JsonValue] => [key, obfuscateValue(child, filler)])
  );
}

export function obfuscateJson(bytes: Uint8Array, options: JsonObfuscationOptions): Result<Buffer, ObfuscationError> {
  let text: string;
  try {
    // The decoder drops a leading BOM
    text = utf8.decode(bytes);
  } catch (error) {
    return err(new ObfuscationError('PARSE_FAILED', 'Body is not valid UTF-8', { cause: error }));
  }

  const parsed = parseJson(text);
  if (!parsed.ok) return parsed;

  const obfuscated = obfuscateValue(parsed.value, options.filler);
  return ok(Buffer.from(JSON.stringify(obfuscated), 'utf-8'));
}
