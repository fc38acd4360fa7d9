export function nowInstant(): string {
  return new Date().toISOString();
}

/** True when `candidate` is the same instant as `reference` or later, at millisecond precision. */
export function isSameOrLater(candidate: Date, reference: Date): boolean {
  return candidate.getTime() >= reference.getTime();
}
