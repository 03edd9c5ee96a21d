import type { RecognitionConfig } from '../config/index.js';
import type { FaceBox, FaceMatch } from '../types.js';

export type DetectionResult = {
  confidence?: number;
  match: FaceMatch | null;
};

export type RecognizeOptions = {
  cameraId: string;
  signal?: AbortSignal;
};

/** The external detector and face matcher, consumed as a scoring function. */
export interface Recognizer {
  detectAndMatch(image: Buffer, options: RecognizeOptions): Promise<DetectionResult>;
}

export type HttpRecognizerOptions = Pick<RecognitionConfig, 'endpoint' | 'apiKey'> & {
  fetch?: typeof fetch;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function parseBox(value: unknown): FaceBox | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const { width, height } = value;
  if (typeof width !== 'number' || typeof height !== 'number') {
    return undefined;
  }
  return { width, height };
}

function parseMatch(value: unknown): FaceMatch | null {
  if (!isRecord(value) || typeof value.similarity !== 'number' || !Number.isFinite(value.similarity)) {
    return null;
  }
  const match: FaceMatch = { similarity: value.similarity };
  const faceId = optionalString(value.faceId);
  const name = optionalString(value.name);
  const box = parseBox(value.box);
  if (faceId) {
    match.faceId = faceId;
  }
  if (name) {
    match.name = name;
  }
  if (box) {
    match.box = box;
  }
  return match;
}

export function parseDetectionResponse(payload: unknown): DetectionResult {
  if (!isRecord(payload)) {
    throw new Error('Recognition response must be a JSON object');
  }

  const { confidence } = payload;
  if (confidence !== undefined && (typeof confidence !== 'number' || !Number.isFinite(confidence))) {
    throw new Error('Recognition response confidence must be a number');
  }

  const result: DetectionResult = { match: parseMatch(payload.match) };
  if (typeof confidence === 'number') {
    result.confidence = confidence;
  }
  return result;
}

/**
 * POSTs the frame as base64 JSON to the recognition endpoint.
 */
export class HttpRecognizer implements Recognizer {
  private readonly endpoint: string;
  private readonly apiKey: string | undefined;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpRecognizerOptions) {
    this.endpoint = options.endpoint;
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async detectAndMatch(image: Buffer, options: RecognizeOptions): Promise<DetectionResult> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    const res = await this.fetchImpl(this.endpoint, {
      method: 'POST',
      headers,
      body: JSON.stringify({ cameraId: options.cameraId, image: image.toString('base64') }),
      signal: options.signal
    });

    if (!res.ok) {
      throw new Error(`Recognition request failed: ${res.status}`);
    }

    const payload: unknown = await res.json();
    return parseDetectionResponse(payload);
  }
}
