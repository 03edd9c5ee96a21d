import type { ThresholdsConfig } from '../config/index.js';
import type { Classification, Severity } from '../types.js';

export type SeverityThresholds = Pick<ThresholdsConfig, 'highSeverityConfidence'>;

function assertNever(value: never): never {
  throw new Error(`Unhandled classification: ${JSON.stringify(value)}`);
}

export function severityOf(classification: Classification, thresholds: SeverityThresholds): Severity {
  switch (classification.kind) {
    case 'no-person':
      return 'none';
    case 'authorized':
      return 'low';
    case 'intruder': {
      const noAuthorizedMatch = classification.match === 'none' || classification.match === 'rejected';
      if (noAuthorizedMatch && classification.confidence >= thresholds.highSeverityConfidence) {
        return 'high';
      }
      // near-miss and partial matches go to human review
      return 'medium';
    }
    default:
      return assertNever(classification);
  }
}

/** Every intruder raises exactly one alert; severity only sets its priority. */
export function shouldAlert(classification: Classification): boolean {
  return classification.kind === 'intruder';
}
