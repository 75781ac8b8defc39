import {
  arePointsCoincident,
  getLineDistanceFromOrigin,
  norm,
} from "./geometry"
import type { FeasibilityVerdict, LinkLengths, Point } from "./types"

export const DEFAULT_EPSILON = 1e-9

export const assertValidEpsilon = (epsilon: number): void => {
  if (!Number.isFinite(epsilon) || epsilon < 0) {
    throw new RangeError(
      `epsilon must be a finite number >= 0, got ${epsilon}`,
    )
  }
}

const isFinitePoint = (p: Point) =>
  Number.isFinite(p.x) && Number.isFinite(p.y)

/**
 * Decide whether the straight segment initial -> desired can be followed
 * by the arm. Checks run in order and the first failure wins:
 *
 * 1. both endpoints inside the workspace annulus
 * 2. the line stays outside the unreachable inner disk
 * 3. the line avoids the origin when the links are equal (singular pose)
 */
export const checkFeasibility = (
  initial: Point,
  desired: Point,
  links: LinkLengths,
  epsilon: number = DEFAULT_EPSILON,
): FeasibilityVerdict => {
  assertValidEpsilon(epsilon)
  const { l1, l2 } = links
  if (
    !isFinitePoint(initial) ||
    !isFinitePoint(desired) ||
    !Number.isFinite(l1) ||
    !Number.isFinite(l2) ||
    l1 <= 0 ||
    l2 <= 0
  ) {
    return "invalid_input"
  }

  const innerRadius = Math.abs(l1 - l2)
  const outerRadius = l1 + l2

  for (const p of [initial, desired]) {
    const r = norm(p.x, p.y)
    if (r > outerRadius + epsilon || r < innerRadius - epsilon) {
      return "out_of_workspace"
    }
  }

  // A zero-length segment has no line; it is treated as passing the origin
  const d = arePointsCoincident(initial, desired, epsilon)
    ? 0
    : getLineDistanceFromOrigin(initial, desired)
  if (d < innerRadius - epsilon) return "trajectory_blocked"

  if (innerRadius <= epsilon && d <= epsilon) return "trajectory_singular"

  return "feasible"
}

export const getFeasibilityMessage = (verdict: FeasibilityVerdict): string => {
  switch (verdict) {
    case "feasible":
      return "Straight-line trajectory is feasible."
    case "invalid_input":
      return "Positions must be finite and link lengths must be positive."
    case "out_of_workspace":
      return "Position(s) is(are) not in the operable range."
    case "trajectory_blocked":
      return "Straight-line trajectory is not possible."
    case "trajectory_singular":
      return "Straight-line trajectory includes a singular point."
  }
}
