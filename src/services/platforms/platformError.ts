import { AxiosRequestConfig, isAxiosError } from "axios";
import { z } from "zod";

export type PublishStep =
  | "credentials"
  | "fetchMedia"
  | "createContainer"
  | "uploadBinary"
  | "pollStatus"
  | "publish"
  | "fetchPermalink"
  | "init"
  | "appendChunk"
  | "finalize"
  | "createPost";

export abstract class PublishError extends Error {
  abstract readonly retryable: boolean;

  constructor(message: string, public readonly step: PublishStep) {
    super(message);
    this.name = this.constructor.name;
  }
}

/** Timeouts, resets, 5xx and 429. Retried with backoff before escalating. */
export class TransientNetworkError extends PublishError {
  readonly retryable = true;

  constructor(
    message: string,
    step: PublishStep,
    public readonly status?: number
  ) {
    super(message, step);
  }
}

/** The remote side answered with a permanent refusal. Never retried. */
export class ProtocolError extends PublishError {
  readonly retryable = false;

  constructor(
    message: string,
    step: PublishStep,
    public readonly remoteCode?: string | number
  ) {
    super(message, step);
  }
}

/** A polling loop ran out of budget before the remote reached a terminal state. */
export class TimeoutError extends PublishError {
  readonly retryable = false;

  constructor(
    message: string,
    step: PublishStep,
    public readonly waitedMs: number
  ) {
    super(message, step);
  }
}

export const isRetryable = (error: unknown): boolean =>
  error instanceof PublishError && error.retryable;

// Graph API, X v2 and X v1.1 all use one of these shapes for error bodies
const remoteErrorBody = z.union([
  z.object({
    error: z.object({
      message: z.string(),
      code: z.union([z.number(), z.string()]).optional(),
      error_subcode: z.number().optional(),
    }),
  }),
  z.object({
    errors: z
      .array(
        z.object({
          message: z.string().optional(),
          detail: z.string().optional(),
          code: z.union([z.number(), z.string()]).optional(),
        })
      )
      .min(1),
  }),
  z.object({ detail: z.string(), title: z.string().optional() }),
]);

export function extractRemoteError(
  body: unknown
): { message: string; code?: string | number } | null {
  const parsed = remoteErrorBody.safeParse(body);
  if (!parsed.success) return null;

  const data = parsed.data;
  if ("error" in data) {
    // the subcode is the specific reason, e.g. 2207027 "media not ready"
    return {
      message: data.error.message,
      code: data.error.error_subcode ?? data.error.code,
    };
  }
  if ("errors" in data) {
    const [first] = data.errors;
    return {
      message: first.message ?? first.detail ?? "Unknown error",
      code: first.code,
    };
  }
  return { message: data.detail };
}

/**
 * Maps whatever a remote call threw onto the publish taxonomy.
 */
export function classifyHttpError(error: unknown, step: PublishStep): PublishError {
  if (error instanceof PublishError) return error;

  if (isAxiosError(error)) {
    const status = error.response?.status;

    if (status === undefined) {
      // no response at all: reset, DNS or client-side timeout
      const code = error.code ?? "NETWORK";
      return new TransientNetworkError(`${step}: ${code} ${error.message}`, step);
    }

    const remote = extractRemoteError(error.response?.data);
    const message = remote?.message ?? error.message;

    if (status >= 500 || status === 429) {
      return new TransientNetworkError(
        `${step}: HTTP ${status} ${message}`,
        step,
        status
      );
    }

    return new ProtocolError(
      `${step}: HTTP ${status} ${message}`,
      step,
      remote?.code ?? status
    );
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ProtocolError(`${step}: ${message}`, step);
}

/**
 * Parses a response body with a schema, turning a shape mismatch into a
 * permanent protocol failure for the given step.
 */
export function parseResponse<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  body: unknown,
  step: PublishStep
): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const remote = extractRemoteError(body);
    throw new ProtocolError(
      remote
        ? `${step}: ${remote.message}`
        : `${step}: unexpected response ${JSON.stringify(body)?.slice(0, 200)}`,
      step,
      remote?.code
    );
  }
  return parsed.data;
}

/** The two axios verbs the platform clients use; axios itself satisfies it. */
export interface HttpClient {
  get(url: string, config?: AxiosRequestConfig): Promise<{ data: unknown }>;
  post(
    url: string,
    body?: unknown,
    config?: AxiosRequestConfig
  ): Promise<{ data: unknown }>;
}

/** Runs one remote call and returns its body, classifying any failure. */
export async function requestData(
  step: PublishStep,
  request: () => Promise<{ data: unknown }>
): Promise<unknown> {
  try {
    const response = await request();
    return response.data;
  } catch (error) {
    throw classifyHttpError(error, step);
  }
}
