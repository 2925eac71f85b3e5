export interface Notifier {
  send(address: string, subject: string, body: string): Promise<void>;
}

export const DEFAULT_NOTIFY_TIMEOUT_MS = 10_000;

export class NotificationTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`notification not delivered within ${timeoutMs}ms`);
    this.name = "NotificationTimeoutError";
  }
}

/** Settles with `work`, or rejects with NotificationTimeoutError once `timeoutMs` elapses. */
export async function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new NotificationTimeoutError(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
