import type { ClassificationDecision, IncomingRequest } from '../types/index.js';

// A single classification strategy; null means "no opinion"
export interface ClassificationRule {
  name: string;
  evaluate(request: IncomingRequest): ClassificationDecision | null;
}
