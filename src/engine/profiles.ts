/**
 * Input Profiles
 *
 * Throttle is scheduled on elapsed time, incline on the vehicle's own
 * position. Both are plain functions so scenarios can compose them freely.
 */

/** Throttle as a function of elapsed time [s]. */
export type ThrottleProfile = (time: number) => number;

/** Incline angle [rad] as a function of current position [m]. */
export type InclineProfile = (position: number) => number;

/** Trapezoidal throttle schedule. Times are in seconds from the start of the run. */
export interface ThrottleRampSpec {
  /** Throttle at t = 0 */
  start: number;
  /** Throttle held on the plateau */
  peak: number;
  /** End of the ramp-up / start of the plateau */
  rampUpEnd: number;
  /** End of the plateau / start of the ramp-down */
  holdEnd: number;
  /** Time at which the ramp-down reaches `end` */
  rampDownEnd: number;
  /** Throttle reached at `rampDownEnd` */
  end: number;
}

/** One stretch of road: the angle applies while position < `until`. */
export interface InclineSegment {
  until: number;
  angle: number;
}

/** 0.2 → 0.5 over 5 s, hold 10 s, then down to 0 over 5 s. */
export const RAMP_THROTTLE: ThrottleRampSpec = {
  start: 0.2,
  peak: 0.5,
  rampUpEnd: 5,
  holdEnd: 15,
  rampDownEnd: 20,
  end: 0,
};

/** A 3 m rise over 60 m, then 9 m over 90 m, then flat. */
export const RAMP_INCLINE: readonly InclineSegment[] = [
  { until: 60, angle: Math.atan(3 / 60) },
  { until: 150, angle: Math.atan(9 / 90) },
];

export function constant(value: number): (arg: number) => number {
  return () => value;
}

/**
 * Piecewise-linear trapezoid.
 *
 * The ramp-down line is not clamped: past `rampDownEnd` it keeps its slope,
 * so callers should end the run there.
 */
export function throttleRamp(ramp: ThrottleRampSpec = RAMP_THROTTLE): ThrottleProfile {
  const upSlope = (ramp.peak - ramp.start) / ramp.rampUpEnd;
  const downSlope = (ramp.end - ramp.peak) / (ramp.rampDownEnd - ramp.holdEnd);

  return (time) => {
    if (time < ramp.rampUpEnd) return ramp.start + upSlope * time;
    if (time < ramp.holdEnd) return ramp.peak;
    return downSlope * (time - ramp.rampDownEnd) + ramp.end;
  };
}

/** Piecewise-constant grade: the first segment whose `until` exceeds x wins. */
export function inclineByPosition(
  segments: readonly InclineSegment[] = RAMP_INCLINE,
  beyond = 0,
): InclineProfile {
  return (position) => {
    for (const segment of segments) {
      if (position < segment.until) return segment.angle;
    }
    return beyond;
  };
}
