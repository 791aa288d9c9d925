export function throwIfAborted(signal?: AbortSignal | null): void {
  if (!signal) return;
  if (!signal.aborted) return;
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    throw reason;
  }
  throw reason ?? new DOMException('The operation was aborted', 'AbortError');
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}
