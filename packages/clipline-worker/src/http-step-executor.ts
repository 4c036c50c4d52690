import {
  type StepExecutionInput,
  StepExecutionError,
  type StepExecutor,
  StepErrorKind,
  type StepResult,
} from '@clipline/core';
import { z } from 'zod';

const StepResponseSchema = z.discriminatedUnion('outcome', [
  z.object({ outcome: z.literal('success'), outputRef: z.string().min(1) }),
  z.object({
    outcome: z.literal('partial'),
    completedUnits: z.number().int().nonnegative(),
    totalUnits: z.number().int().positive(),
    error: z.string(),
  }),
  z.object({ outcome: z.literal('failure'), error: z.string() }),
]);

export type HttpStepExecutorConfig = {
  /** Base URL of the step service; each step is posted to `<baseUrl>/steps/<step>` */
  baseUrl: string;
  /** Sent as a bearer token when set */
  token?: string;
};

/**
 * Runs pipeline steps by calling the step service over HTTP. Response codes map onto retry
 * behaviour: 429 is rate limiting, 5xx is transient and any other 4xx is permanent.
 */
export class HttpStepExecutor implements StepExecutor {
  private readonly baseUrl: string;

  constructor(private readonly config: HttpStepExecutorConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
  }

  async execute(input: StepExecutionInput): Promise<StepResult> {
    const response = await this.post(input);

    if (response.status === 429) {
      throw new StepExecutionError(`Step service throttled ${input.step} for task ${input.taskId}`, {
        kind: StepErrorKind.RATE_LIMITED,
        retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
      });
    }

    if (!response.ok) {
      const detail = (await response.text()).slice(0, 200);

      throw new StepExecutionError(`Step service answered ${response.status} for ${input.step}: ${detail}`, {
        kind: response.status >= 500 ? StepErrorKind.TRANSIENT : StepErrorKind.PERMANENT,
      });
    }

    const parsed = StepResponseSchema.safeParse(await response.json());

    if (!parsed.success) {
      throw new StepExecutionError(`Step service sent a malformed response for ${input.step}`, {
        kind: StepErrorKind.PERMANENT,
        cause: parsed.error,
      });
    }

    const body = parsed.data;

    switch (body.outcome) {
      case 'success':
        return { outcome: 'success', outputRef: body.outputRef };
      case 'partial':
        return {
          outcome: 'partial',
          progress: { completedUnits: body.completedUnits, totalUnits: body.totalUnits },
          error: new Error(body.error),
        };
      case 'failure':
        return { outcome: 'failure', error: new Error(body.error) };
      default: {
        const _exhaustiveCheck: never = body;
        throw new Error(`Unknown step outcome ${JSON.stringify(_exhaustiveCheck)}`);
      }
    }
  }

  private async post(input: StepExecutionInput): Promise<Response> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };

    if (this.config.token) {
      headers.Authorization = `Bearer ${this.config.token}`;
    }

    try {
      return await fetch(`${this.baseUrl}/steps/${input.step}`, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          taskId: input.taskId,
          channelId: input.channelId,
          input: input.input,
          resumeFrom: input.resumeFrom
            ? { completedUnits: input.resumeFrom.completedUnits, totalUnits: input.resumeFrom.totalUnits }
            : null,
        }),
        signal: input.signal,
      });
    } catch (error) {
      if (input.signal.aborted) {
        throw error;
      }

      throw new StepExecutionError(`Could not reach the step service for ${input.step}`, {
        kind: StepErrorKind.TRANSIENT,
        cause: error,
      });
    }
  }
}

/**
 * `Retry-After` as milliseconds. Accepts delay-seconds or an HTTP date.
 */
export function parseRetryAfter(value: string | null, now: Date = new Date()): number | undefined {
  if (!value) {
    return undefined;
  }

  if (/^\d+$/.test(value.trim())) {
    return Number(value.trim()) * 1_000;
  }

  const at = Date.parse(value);

  return Number.isNaN(at) ? undefined : Math.max(0, at - now.getTime());
}
