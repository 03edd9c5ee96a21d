export type Severity = 'none' | 'low' | 'medium' | 'high';

export type CameraStatus = 'online' | 'offline' | 'unknown';

export type ClassificationKind = 'no-person' | 'authorized' | 'intruder';

export type MatchState = 'none' | 'rejected' | 'ambiguous' | 'accepted';

export type DegradedReason = 'timeout' | 'error';

declare const epochMsBrand: unique symbol;

/** Integer epoch milliseconds that already went through edge normalization. */
export type EpochMs = number & { readonly [epochMsBrand]: true };

export interface Identity {
  faceId: string;
  name: string;
  personId?: string;
}

export interface FaceBox {
  width: number;
  height: number;
}

export interface FaceMatch {
  similarity: number;
  faceId?: string;
  name?: string;
  box?: FaceBox;
}

/** What the recognition step hands to the decision maker. */
export interface RecognitionOutcome {
  confidence: number;
  match: FaceMatch | null;
  degraded: DegradedReason | null;
}

export type Classification =
  | { kind: 'no-person'; confidence: number }
  | { kind: 'authorized'; confidence: number; similarity: number; identity: Identity }
  | {
      kind: 'intruder';
      confidence: number;
      similarity: number | null;
      match: Exclude<MatchState, 'accepted'>;
      degraded: DegradedReason | null;
    };

export interface FrameInput {
  cameraId: string;
  timestamp?: number | string | Date;
  image: Buffer;
  detectionConfidence?: number;
}

export interface EventRecord {
  eventId: string;
  cameraId: string;
  timestamp: EpochMs;
  classification: ClassificationKind;
  personDetected: boolean;
  authorized: boolean;
  confidence: number;
  faceSimilarity: number | null;
  personName: string | null;
  faceId: string | null;
  severity: Severity;
  degraded: DegradedReason | null;
  reviewed: boolean;
}

export interface CameraState {
  cameraId: string;
  lastHeartbeat: number | null;
  status: CameraStatus;
}

export interface AlertPayload {
  eventId: string;
  cameraId: string;
  cameraName: string;
  location: string;
  severity: Exclude<Severity, 'none'>;
  classification: ClassificationKind;
  confidence: number;
  similarity: number | null;
  timestamp: number;
  message: string;
}

export interface LivenessTransition {
  cameraId: string;
  from: CameraStatus;
  to: CameraStatus;
  at: number;
  lastHeartbeat: number;
}
