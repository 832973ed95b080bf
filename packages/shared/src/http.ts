import { UpstreamError } from "./errors";

export type RequestJsonOptions = {
  service: string;
  timeoutMs: number;
  signal?: AbortSignal | undefined;
};

export function deadlineSignal(timeoutMs: number, parent?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return parent ? AbortSignal.any([parent, timeout]) : timeout;
}

export async function requestJson(url: string, init: RequestInit, options: RequestJsonOptions): Promise<unknown> {
  const response = await fetch(url, { ...init, signal: deadlineSignal(options.timeoutMs, options.signal) });

  if (!response.ok) {
    const errText = await response.text().catch(() => "");
    throw new UpstreamError(
      options.service,
      `${options.service} API error: ${response.status} ${errText}`.trim(),
      response.status
    );
  }

  return response.json();
}

/**
 * Rejects with a timeout error when `promise` does not settle in time. The
 * underlying work is not cancelled, callers only stop waiting for it.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
  });

  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
