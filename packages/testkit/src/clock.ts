export interface ManualClock {
  now: () => Date;
  advance(milliseconds: number): void;
  set(isoTimestamp: string): void;
}

function parseInstant(isoTimestamp: string): number {
  const instant = Date.parse(isoTimestamp);

  if (Number.isNaN(instant)) {
    throw new Error(`Invalid ISO timestamp: ${isoTimestamp}`);
  }

  return instant;
}

export function fixedClock(isoTimestamp: string): () => Date {
  const fixedInstant = parseInstant(isoTimestamp);
  return () => new Date(fixedInstant);
}

export function manualClock(isoTimestamp: string): ManualClock {
  let current = parseInstant(isoTimestamp);

  return {
    now: () => new Date(current),
    advance(milliseconds: number) {
      current += milliseconds;
    },
    set(nextIsoTimestamp: string) {
      current = parseInstant(nextIsoTimestamp);
    }
  };
}
