const SEQUENCE_SUFFIX = /_event_(\d+)$/;

export function makeEventId(runId: string, seq: number): string {
  return `${runId}_event_${seq}`;
}

/**
 * Numeric suffix of a `{runId}_event_{n}` id, or null when the id has none.
 * Every component that orders events derives the sequence through here.
 */
export function parseEventSequence(eventId: string): number | null {
  const match = SEQUENCE_SUFFIX.exec(eventId);
  if (!match) return null;
  const seq = Number(match[1]);
  return Number.isSafeInteger(seq) ? seq : null;
}
