export class TimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export async function delay(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withTimeout<T>(operation: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timeoutHandle: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      reject(new TimeoutError(label, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation, timeoutPromise]);
  } finally {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  }
}

export function backoffDelayMs(attempt: number, baseMs: number, maxMs: number): number {
  const baseDelay = Math.min(maxMs, baseMs * 2 ** (attempt - 1));
  return Math.round(baseDelay * (0.8 + Math.random() * 0.4));
}
