import type { CharRange } from '../types/index.js';

export type RandomSource = () => number;

// Pluggable replacement generator for text and numeric content
export interface FillerGenerator {
  text(input: string): string;
  number(input: number): number;
}

interface CompiledRange {
  start: number;
  end: number;
  targetStart: number;
  targetEnd: number;
}

function compileRange(range: CharRange): CompiledRange {
  return {
    start: range.start.codePointAt(0) ?? 0,
    end: range.end.codePointAt(0) ?? 0,
    targetStart: range.targetStart.codePointAt(0) ?? 0,
    targetEnd: range.targetEnd.codePointAt(0) ?? 0
  };
}

function randomInt(random: RandomSource, minInclusive: number, maxInclusive: number): number {
  return minInclusive + Math.floor(random() * (maxInclusive - minInclusive + 1));
}

// Uniform pick from [min, max] that is never `exclude`
function randomIntExcluding(random: RandomSource, min: number, max: number, exclude: number): number {
  if (exclude < min || exclude > max) return randomInt(random, min, max);
  if (min === max) return min;

  const picked = randomInt(random, min, max - 1);
  return picked >= exclude ? picked + 1 : picked;
}

function fractionDigits(value: number): number {
  const text = String(Math.abs(value));
  if (text.includes('e')) {
    const [mantissa = '', exponent = '0'] = text.split('e');
    const mantissaDigits = mantissa.split('.')[1]?.length ?? 0;
    return Math.max(0, mantissaDigits - Number(exponent));
  }
  return text.split('.')[1]?.length ?? 0;
}

/**
 * Replaces every character that falls inside a configured range with a random
 * character of the matching target range. Whitespace, punctuation and symbols
 * outside all ranges are kept, so word boundaries and lengths survive.
 */
export class CharacterClassFiller implements FillerGenerator {
  private readonly ranges: CompiledRange[];

  constructor(ranges: readonly CharRange[], private readonly random: RandomSource = Math.random) {
    this.ranges = ranges.map(compileRange);
  }

  private replaceChar(char: string): string {
    const code = char.codePointAt(0);
    if (code === undefined) return char;

    const range = this.ranges.find(candidate => code >= candidate.start && code <= candidate.end);
    if (!range) return char;

    return String.fromCodePoint(randomIntExcluding(this.random, range.targetStart, range.targetEnd, code));
  }

  text(input: string): string {
    let output = '';
    for (const char of input) {
      output += this.replaceChar(char);
    }
    return output;
  }

  number(input: number): number {
    if (input === 0 || !Number.isFinite(input)) return input;

    const sign = input < 0 ? -1 : 1;
    const magnitude = Math.abs(input);

    if (Number.isInteger(magnitude)) {
      if (!Number.isSafeInteger(magnitude)) {
        // Same decimal exponent, different leading digits, never past Number.MAX_VALUE
        const floor = 10 ** Math.floor(Math.log10(magnitude));
        const mantissaCeiling = Math.min(9.999, Number.MAX_VALUE / floor);
        const mantissa = 1 + this.random() * (mantissaCeiling - 1);
        const candidate = Math.min(Math.round(mantissa * floor), Number.MAX_VALUE);
        if (candidate !== magnitude) return sign * candidate;
        return sign * (magnitude === floor ? floor * 1.5 : floor);
      }

      const digits = String(magnitude).length;
      const min = digits === 1 ? 1 : 10 ** (digits - 1);
      const max = 10 ** digits - 1;
      return sign * randomIntExcluding(this.random, min, max, magnitude);
    }

    const decimals = Math.min(fractionDigits(magnitude), 15);
    const exponent = Math.floor(Math.log10(magnitude));
    const step = 10 ** -decimals;
    const mantissa = 1 + this.random() * 8.999;
    let candidate = Number((mantissa * 10 ** exponent).toFixed(decimals));

    if (candidate === magnitude || candidate === 0) {
      candidate = Number((magnitude + step).toFixed(decimals));
    }
    return sign * candidate;
  }
}
