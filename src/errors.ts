export class ChannelPublishError extends Error {
  public readonly runId: string;

  public constructor(runId: string, eventId: string, cause: unknown) {
    super(`failed to publish ${eventId} for run ${runId}`, { cause });
    this.name = "ChannelPublishError";
    this.runId = runId;
  }
}

export class ChannelBackendUnavailableError extends Error {
  public constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "ChannelBackendUnavailableError";
  }
}

export class WireFormatError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "WireFormatError";
  }
}

export class CancelTimeoutError extends Error {
  public readonly timeoutMs: number;

  public constructor(runId: string, timeoutMs: number) {
    super(`run ${runId} did not settle within ${timeoutMs}ms`);
    this.name = "CancelTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
