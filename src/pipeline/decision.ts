import type { ThresholdsConfig } from '../config/index.js';
import type { Classification, FaceMatch, Identity, MatchState, RecognitionOutcome } from '../types.js';

export type DecisionThresholds = Pick<
  ThresholdsConfig,
  'minDetectionConfidence' | 'faceMatchThreshold' | 'ambiguityMargin'
>;

export type Decision = {
  personDetected: boolean;
  authorized: boolean;
};

function clampScore(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(100, Math.max(0, value));
}

export function isPersonDetected(confidence: number, thresholds: DecisionThresholds): boolean {
  return clampScore(confidence) >= thresholds.minDetectionConfidence;
}

/**
 * The two-flag decision. The face-match branch is only evaluated once a person is detected.
 */
export function decide(
  confidence: number,
  similarity: number | null,
  hasAuthorizedMatch: boolean,
  thresholds: DecisionThresholds
): Decision {
  if (!isPersonDetected(confidence, thresholds)) {
    return { personDetected: false, authorized: false };
  }

  const authorized =
    hasAuthorizedMatch && similarity !== null && clampScore(similarity) >= thresholds.faceMatchThreshold;
  return { personDetected: true, authorized };
}

/** A match only names someone when both the face id and the name are known. */
export function identityOf(match: FaceMatch | null): Identity | null {
  if (!match || !match.faceId || !match.name) {
    return null;
  }
  return { faceId: match.faceId, name: match.name };
}

export function resolveMatchState(
  similarity: number | null,
  identity: Identity | null,
  thresholds: DecisionThresholds
): MatchState {
  if (similarity === null) {
    return 'none';
  }

  const score = clampScore(similarity);
  if (score >= thresholds.faceMatchThreshold && identity) {
    return 'accepted';
  }

  if (score >= thresholds.faceMatchThreshold - thresholds.ambiguityMargin) {
    return 'ambiguous';
  }

  return 'rejected';
}

export function classify(outcome: RecognitionOutcome, thresholds: DecisionThresholds): Classification {
  const confidence = clampScore(outcome.confidence);
  const similarity = outcome.match ? clampScore(outcome.match.similarity) : null;
  const identity = identityOf(outcome.match);
  const decision = decide(confidence, similarity, identity !== null, thresholds);

  if (!decision.personDetected) {
    return { kind: 'no-person', confidence };
  }

  if (decision.authorized && identity && similarity !== null) {
    return { kind: 'authorized', confidence, similarity, identity };
  }

  const match = resolveMatchState(similarity, identity, thresholds);
  return {
    kind: 'intruder',
    confidence,
    similarity,
    match: match === 'accepted' ? 'ambiguous' : match,
    degraded: outcome.degraded
  };
}
