export interface ClockPort {
  nowMs(): number;
}

/**
 * System clock; only composition roots should create one
 */
export function createSystemClock(): ClockPort {
  return { nowMs: () => Date.now() };
}
