import { DEFAULT_EPSILON } from "./checkFeasibility"
import { lerpPoint } from "./geometry"
import { solveJointAngles } from "./solveJointAngles"
import type {
  ElbowBranch,
  LinkLengths,
  Point,
  Trajectory,
  Waypoint,
  WaypointTag,
} from "./types"

export const DEFAULT_STEPS = 50

export const assertValidSteps = (steps: number): void => {
  if (!Number.isInteger(steps) || steps < 1) {
    throw new RangeError(`steps must be a positive integer, got ${steps}`)
  }
}

const getWaypointTag = (index: number, steps: number): WaypointTag => {
  if (index === 0) return "initial"
  if (index === steps) return "final"
  return "intermediate"
}

/**
 * Waypoint `index` of a straight line split into `steps` segments.
 * The final waypoint is placed exactly on `desired`.
 */
export const computeWaypoint = (
  initial: Point,
  desired: Point,
  links: LinkLengths,
  steps: number,
  index: number,
  branch: ElbowBranch = "positive",
  epsilon: number = DEFAULT_EPSILON,
): Waypoint => {
  let position: Point
  if (index === 0) position = initial
  else if (index === steps) position = desired
  else position = lerpPoint(initial, desired, index / steps)

  return {
    index,
    tag: getWaypointTag(index, steps),
    angles: solveJointAngles(position, links, branch, epsilon),
    position: { x: position.x, y: position.y },
  }
}

/**
 * Solve every waypoint of the straight line initial -> desired.
 * Feasibility is not checked here; see checkFeasibility.
 */
export const sampleTrajectory = (
  initial: Point,
  desired: Point,
  links: LinkLengths,
  steps: number = DEFAULT_STEPS,
  branch: ElbowBranch = "positive",
  epsilon: number = DEFAULT_EPSILON,
): Trajectory => {
  assertValidSteps(steps)
  const trajectory: Trajectory = []
  for (let i = 0; i <= steps; i++) {
    trajectory.push(
      computeWaypoint(initial, desired, links, steps, i, branch, epsilon),
    )
  }
  return trajectory
}
