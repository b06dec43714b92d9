/**
 * Case Study Builder — Generative Backend Contract
 *
 * Implementations throw the `Backend*Error` family from `../errors` so the
 * narrative generator can pick a recovery path without knowing the vendor.
 */

import type { z } from "zod";
import { AttemptDeadlineError } from "../errors";

export interface TextCompletionRequest {
  system: string;
  prompt: string;
  maxTokens: number;
  temperature?: number;
  /** Aborted when the caller stops waiting */
  signal?: AbortSignal;
}

export interface StructuredCompletionRequest<T> extends TextCompletionRequest {
  /** Validates the parsed JSON; a mismatch is an invalid response */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export interface GenerativeBackend {
  readonly name: string;

  completeStructured<T>(request: StructuredCompletionRequest<T>): Promise<T>;

  completeText(request: TextCompletionRequest): Promise<string>;
}

/**
 * Run `work` as a cancellable unit.  When the deadline passes the signal is
 * aborted and the returned promise rejects with `AttemptDeadlineError`;
 * anything `work` settles with afterwards is ignored.
 */
export async function runWithDeadline<T>(
  timeoutMs: number,
  work: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new AttemptDeadlineError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([work(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
