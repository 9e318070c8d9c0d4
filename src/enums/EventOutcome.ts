export enum EventOutcome {
  APPLIED = 'applied', // Plan changed
  IGNORED = 'ignored', // Event did not match the plan (no-op)
}
