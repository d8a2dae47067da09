import type { ClassificationRule } from './types.js';

export interface OverrideSettings {
  param: string;
  value: string;
}

export function overrideRule(settings: OverrideSettings): ClassificationRule {
  return {
    name: 'override',
    evaluate(request) {
      const values = request.query[settings.param];
      if (!values || !values.includes(settings.value)) {
        return null;
      }

      return {
        verdict: 'obfuscate',
        reason: 'forced-override',
        rule: `${settings.param}=${settings.value}`
      };
    }
  };
}
