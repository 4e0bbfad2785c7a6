/**
 * Job Engine
 *
 * Drives the submit → poll → terminal state machine shared by every
 * asynchronous backend. A backend only describes its protocol through a
 * PollingStrategy; the loop below is the same for all of them.
 *
 *   submitted → pending* → succeeded | failed | timed_out
 *
 * Submissions are never retried: re-submitting creates a second billable job.
 */

import { JobState, PollOutcome, PollingSchedule } from '../../../types';
import {
  CancelledError,
  ProviderAPIError,
  ProviderTimeoutError,
  toProviderError,
} from '../providers/errors';
import { HttpClient, HttpRequest, HttpResponse } from './http-client';
import { ProviderLogger } from './logger';
import { Timer } from './timer';

// ============================================================
// TYPES
// ============================================================

export interface PollingStrategy<TPayload> extends PollingSchedule {
  /** Request that creates the job */
  submitRequest: HttpRequest;
  /** HTTP statuses that count as a successful submission */
  acceptedSubmitStatuses: number[];
  /** Job id or polling URL from the submission body */
  extractJobHandle(body: unknown): string | undefined;
  /** Request that checks the job once */
  statusRequest(handle: string): HttpRequest;
  /** Map a status body onto pending / succeeded / failed */
  classify(body: unknown): PollOutcome<TPayload>;
  /** HTTP statuses that mean "still working" rather than an error */
  pendingStatusCodes?: number[];
}

/**
 * Per-call job state. Never shared between calls.
 */
export interface PollableJob<TPayload> {
  id: string;
  state: JobState;
  attemptsMade: number;
  resultPayload?: TPayload;
  failureReason?: string;
}

export const NO_OUTPUT_MESSAGE = 'Generation completed but no output found';

// ============================================================
// ENGINE
// ============================================================

export class JobEngine {
  constructor(
    private readonly provider: string,
    private readonly httpClient: HttpClient,
    private readonly timer: Timer,
    private readonly logger: ProviderLogger
  ) {}

  /**
   * Submit a job and poll it until it reaches a terminal state.
   * Resolves with the backend payload of the succeeded job.
   */
  async run<TPayload>(strategy: PollingStrategy<TPayload>, signal?: AbortSignal): Promise<TPayload> {
    const submitResponse = await this.send(
      strategy.submitRequest,
      strategy.acceptedSubmitStatuses,
      signal
    );
    const handle = strategy.extractJobHandle(await this.readJson(submitResponse));

    if (!handle) {
      throw new ProviderAPIError(this.provider, 500, `No job ID returned from ${this.provider} API`);
    }

    const job: PollableJob<TPayload> = { id: handle, state: 'submitted', attemptsMade: 0 };
    this.logger.debug('Job submitted', { jobId: job.id });

    while (job.attemptsMade < strategy.maxAttempts) {
      await this.wait(strategy.pollIntervalMs, signal);

      const outcome = await this.poll(job, strategy, signal);
      job.attemptsMade++;

      switch (outcome.state) {
        case 'succeeded':
          if (outcome.payload === undefined) {
            job.state = 'failed';
            job.failureReason = NO_OUTPUT_MESSAGE;
            throw new ProviderAPIError(this.provider, 500, NO_OUTPUT_MESSAGE);
          }
          job.state = 'succeeded';
          job.resultPayload = outcome.payload;
          this.logger.debug('Job succeeded', { jobId: job.id, attempts: job.attemptsMade });
          return outcome.payload;

        case 'failed':
          job.state = 'failed';
          job.failureReason = outcome.reason || 'Unknown error';
          this.logger.error('Job failed', { jobId: job.id, reason: job.failureReason });
          throw new ProviderAPIError(
            this.provider,
            500,
            `Generation failed: ${job.failureReason}`
          );

        case 'pending':
          job.state = 'pending';
          this.logger.debug(
            `Task not ready yet (attempt ${job.attemptsMade}/${strategy.maxAttempts}): ${
              outcome.status ?? 'unknown'
            }`,
            { jobId: job.id }
          );
          break;
      }
    }

    job.state = 'timed_out';
    this.logger.error('Job timed out', { jobId: job.id, attempts: job.attemptsMade });
    throw new ProviderTimeoutError(this.provider);
  }

  /**
   * One request whose status must be in acceptedStatuses. Used for job
   * submission and by the synchronous backends.
   */
  async send(
    request: HttpRequest,
    acceptedStatuses: number[],
    signal?: AbortSignal
  ): Promise<HttpResponse> {
    const response = await this.transport(request, signal);

    if (!acceptedStatuses.includes(response.status)) {
      const errorText = await this.readText(response);
      this.logger.error(`Image Generation API error for ${this.provider}: ${errorText}`, {
        status: response.status,
      });
      throw new ProviderAPIError(this.provider, response.status, errorText);
    }

    return response;
  }

  /**
   * Parse a JSON body, reporting malformed bodies as a provider error
   */
  async readJson(response: HttpResponse): Promise<unknown> {
    try {
      return await response.json();
    } catch (error) {
      throw new ProviderAPIError(
        this.provider,
        500,
        `Malformed response from ${this.provider} API`,
        error instanceof Error ? error : undefined
      );
    }
  }

  // ============================================================
  // PRIVATE
  // ============================================================

  private async poll<TPayload>(
    job: PollableJob<TPayload>,
    strategy: PollingStrategy<TPayload>,
    signal?: AbortSignal
  ): Promise<PollOutcome<TPayload>> {
    const response = await this.transport(strategy.statusRequest(job.id), signal);

    if (strategy.pendingStatusCodes?.includes(response.status)) {
      // drain so the connection is released before the next wait
      await this.readText(response);
      return { state: 'pending', status: `HTTP ${response.status}` };
    }

    if (!response.ok) {
      const errorText = await this.readText(response);
      throw new ProviderAPIError(
        this.provider,
        response.status,
        `Error polling for results: ${errorText}`
      );
    }

    return strategy.classify(await this.readJson(response));
  }

  private async transport(request: HttpRequest, signal?: AbortSignal): Promise<HttpResponse> {
    if (signal?.aborted) {
      throw new CancelledError(this.provider);
    }

    try {
      return await this.httpClient.send(request, signal);
    } catch (error) {
      throw toProviderError(this.provider, error, signal, `${request.method} request failed`);
    }
  }

  private async wait(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new CancelledError(this.provider);
    }

    try {
      await this.timer.wait(ms, signal);
    } catch (error) {
      throw toProviderError(this.provider, error, signal);
    }
  }

  private async readText(response: HttpResponse): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      this.logger.warn('Could not read error body', {
        status: response.status,
        error: error instanceof Error ? error.message : String(error),
      });
      return `HTTP ${response.status}`;
    }
  }
}
