export { overrideRule, type OverrideSettings } from './override-rule.js';
export { signatureRule } from './signature-rule.js';
export type { ClassificationRule } from './types.js';

import type { ClassificationDecision, ClassifierConfig, IncomingRequest } from '../types/index.js';
import { overrideRule } from './override-rule.js';
import { signatureRule } from './signature-rule.js';
import type { ClassificationRule } from './types.js';

const DEFAULT_DECISION: ClassificationDecision = {
  verdict: 'passthrough',
  reason: 'default'
};

// Compiled once at startup; the returned list is never mutated
export function buildRules(config: ClassifierConfig): readonly ClassificationRule[] {
  const rules: ClassificationRule[] = [
    overrideRule(config.override),
    ...config.signatures.map(signature => signatureRule(signature, config.header))
  ];

  return Object.freeze(rules);
}

export function classify(request: IncomingRequest, rules: readonly ClassificationRule[]): ClassificationDecision {
  for (const rule of rules) {
    const decision = rule.evaluate(request);
    if (decision) return decision;
  }

  return { ...DEFAULT_DECISION };
}
