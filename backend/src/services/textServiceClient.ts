// Text Service Client - transport contract to the external text generation service
// One logical operation: POST a routed request, get generated content back
import axios, { AxiosInstance } from 'axios';
import { GenerationResponseSchema, IGenerationResponse, IRoutedRequest } from '../models';
import {
  SlideGenerationError,
  InvalidResponseError,
  ServiceError,
  ServiceUnavailableError,
  TimeoutError,
} from '../utils/errors';

/**
 * Anything able to turn a routed request into generated content.
 * The stage depends on this, so tests can swap in a stub.
 */
export interface IGenerationClient {
  generate(routed: IRoutedRequest, signal?: AbortSignal): Promise<IGenerationResponse>;
}

export interface ITextServiceClientOptions {
  baseUrl: string;
  /** Limit for a single HTTP attempt */
  timeoutMs: number;
  /** Limit for all attempts and backoff waits of one slide together */
  slideTimeoutMs: number;
  maxRetries: number;
  retryBackoffMs: number;
  httpClient?: AxiosInstance;
}

const HEALTH_CHECK_TIMEOUT_MS = 5000;

// Resolves early when the signal aborts; the caller decides what the abort means
const waitBeforeRetry = (ms: number, signal: AbortSignal): Promise<void> => {
  return new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
};

/**
 * 5xx, timeouts and unreachable service are transient; 4xx and bad bodies are not
 */
const isRetryable = (error: SlideGenerationError): boolean => {
  if (error instanceof ServiceError) return error.status >= 500;
  return error instanceof TimeoutError || error instanceof ServiceUnavailableError;
};

export class TextServiceClient implements IGenerationClient {
  private readonly http: AxiosInstance;
  private readonly timeoutMs: number;
  private readonly slideTimeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBackoffMs: number;

  constructor(options: ITextServiceClientOptions) {
    this.http =
      options.httpClient ??
      axios.create({
        baseURL: options.baseUrl,
        headers: { 'Content-Type': 'application/json' },
      });
    this.timeoutMs = options.timeoutMs;
    this.slideTimeoutMs = options.slideTimeoutMs;
    this.maxRetries = options.maxRetries;
    this.retryBackoffMs = options.retryBackoffMs;
  }

  /**
   * Generate content for one routed request.
   * Retries transient failures up to maxRetries times with exponential backoff,
   * all within the slide budget. `signal` is the stage's own deadline.
   */
  async generate(routed: IRoutedRequest, signal?: AbortSignal): Promise<IGenerationResponse> {
    const budget = AbortSignal.timeout(this.slideTimeoutMs);
    const slideSignal = signal ? AbortSignal.any([signal, budget]) : budget;
    let attempt = 0;

    for (;;) {
      try {
        const response = await this.http.post<unknown>(routed.endpoint, routed.request.payload, {
          timeout: this.timeoutMs,
          signal: slideSignal,
        });
        return this.parseResponse(response.data, routed.endpoint);
      } catch (error) {
        const translated = this.abortError(routed, budget, signal) ?? this.translateError(error, routed.endpoint);

        if (slideSignal.aborted || !isRetryable(translated) || attempt >= this.maxRetries) {
          throw translated;
        }

        const delay = this.retryBackoffMs * 2 ** attempt;
        attempt += 1;
        console.warn(
          `⚠️  Text service call failed for slide ${routed.request.slideId} (${translated.message}), ` +
            `retry ${attempt}/${this.maxRetries} in ${delay}ms`
        );
        await waitBeforeRetry(delay, slideSignal);

        const abandoned = this.abortError(routed, budget, signal);
        if (abandoned) throw abandoned;
      }
    }
  }

  /**
   * Check the text service is reachable
   */
  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.http.get('/health', { timeout: HEALTH_CHECK_TIMEOUT_MS });
      return response.status === 200;
    } catch (error) {
      console.warn(`⚠️  Text service health check failed: ${error instanceof Error ? error.message : error}`);
      return false;
    }
  }

  private parseResponse(data: unknown, endpoint: string): IGenerationResponse {
    const parsed = GenerationResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new InvalidResponseError(
        `Text service returned an unexpected body from ${endpoint}: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.') || 'body'} ${issue.message}`)
          .join('; ')}`
      );
    }
    return parsed.data;
  }

  private abortError(routed: IRoutedRequest, budget: AbortSignal, signal?: AbortSignal): TimeoutError | undefined {
    if (budget.aborted) {
      return new TimeoutError(
        `Slide ${routed.request.slideId} exceeded its ${this.slideTimeoutMs}ms generation budget`
      );
    }
    if (signal?.aborted) {
      return new TimeoutError(`Request to ${routed.endpoint} abandoned: stage deadline exceeded`);
    }
    return undefined;
  }

  private translateError(error: unknown, endpoint: string): SlideGenerationError {
    if (error instanceof SlideGenerationError) {
      return error;
    }

    // Aborted through the stage deadline signal
    if (axios.isCancel(error)) {
      return new TimeoutError(`Request to ${endpoint} abandoned: stage deadline exceeded`);
    }

    if (axios.isAxiosError(error)) {
      if (error.response) {
        return new ServiceError(
          `Text service responded ${error.response.status} for ${endpoint}`,
          error.response.status,
          error.response.data
        );
      }
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new TimeoutError(`Request to ${endpoint} timed out after ${this.timeoutMs}ms`);
      }
      return new ServiceUnavailableError(`Text service unreachable for ${endpoint}: ${error.message}`);
    }

    const message = error instanceof Error ? error.message : String(error);
    return new ServiceUnavailableError(`Text service call to ${endpoint} failed: ${message}`);
  }
}
