import logger, { type Logger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { IdentityDirectory } from '../store/eventStore.js';
import type { DegradedReason, FaceMatch, RecognitionOutcome } from '../types.js';
import type { Recognizer } from './client.js';

const COMPONENT = 'recognition';

export type FailSafeRecognizerOptions = {
  recognizer: Recognizer;
  timeoutMs: number;
  fallbackConfidence: number;
  minFaceSize: number;
  identities?: IdentityDirectory;
  log?: Logger;
  metrics?: MetricsRegistry;
};

export type RecognitionRequest = {
  cameraId: string;
  image: Buffer;
  detectionConfidence?: number;
};

class RecognitionTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Recognition timed out after ${timeoutMs}ms`);
    this.name = 'RecognitionTimeoutError';
  }
}

function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

/**
 * Bounds the external call with a timeout and turns any failure into a no-match outcome,
 * so a frame with a person in it still classifies (as an intruder) when recognition is down.
 * Only a caller abort propagates.
 */
export class FailSafeRecognizer {
  private readonly options: FailSafeRecognizerOptions;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;

  constructor(options: FailSafeRecognizerOptions) {
    this.options = options;
    this.log = options.log ?? logger;
    this.metrics = options.metrics ?? metrics;
  }

  async recognize(request: RecognitionRequest, signal?: AbortSignal): Promise<RecognitionOutcome> {
    const controller = new AbortController();
    const forwardAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', forwardAbort, { once: true });
    const timer = setTimeout(() => {
      controller.abort(new RecognitionTimeoutError(this.options.timeoutMs));
    }, this.options.timeoutMs);

    this.metrics.incrementCounter(COMPONENT, 'requests');
    try {
      const result = await this.metrics.time('recognition.ms', () =>
        Promise.race([
          this.options.recognizer.detectAndMatch(request.image, {
            cameraId: request.cameraId,
            signal: controller.signal
          }),
          rejectOnAbort(controller.signal)
        ])
      );

      return {
        confidence: result.confidence ?? this.fallbackConfidence(request),
        match: this.resolveMatch(request.cameraId, result.match),
        degraded: null
      };
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason;
      }

      const reason: DegradedReason = error instanceof RecognitionTimeoutError ? 'timeout' : 'error';
      this.metrics.incrementCounter(COMPONENT, reason === 'timeout' ? 'timeouts' : 'failures');
      this.metrics.recordError(COMPONENT, error instanceof Error ? error.message : String(error));
      this.log.warn(
        { err: error, cameraId: request.cameraId, reason },
        'Recognition unavailable; classifying frame without a face match'
      );
      return { confidence: this.fallbackConfidence(request), match: null, degraded: reason };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  private fallbackConfidence(request: RecognitionRequest): number {
    return request.detectionConfidence ?? this.options.fallbackConfidence;
  }

  private resolveMatch(cameraId: string, match: FaceMatch | null): FaceMatch | null {
    if (!match) {
      return null;
    }

    const { box } = match;
    if (box && Math.min(box.width, box.height) < this.options.minFaceSize) {
      this.metrics.incrementCounter(COMPONENT, 'faceTooSmall');
      this.log.debug({ cameraId, box, minFaceSize: this.options.minFaceSize }, 'Discarding match on undersized face');
      return null;
    }

    if (match.faceId && !match.name && this.options.identities) {
      try {
        const identity = this.options.identities.getIdentity(match.faceId);
        if (identity) {
          return { ...match, name: identity.name };
        }
      } catch (error) {
        this.log.warn({ err: error, faceId: match.faceId }, 'Identity lookup failed');
      }
    }

    return match;
  }
}
