import type { ArmPose, JointAngles, LinkLengths, Point } from "./types"

export const norm = (a: number, b: number): number => Math.sqrt(a * a + b * b)

export const lerpPoint = (a: Point, b: Point, t: number): Point => ({
  x: a.x + (b.x - a.x) * t,
  y: a.y + (b.y - a.y) * t,
})

export const arePointsCoincident = (
  a: Point,
  b: Point,
  epsilon: number,
): boolean => norm(b.x - a.x, b.y - a.y) <= epsilon

/**
 * Perpendicular distance from the origin to the infinite line through
 * p0 and p1, from the implicit form a*x + b*y + c = 0.
 *
 * When p0 == p1 the implicit form collapses to 0 = 0, which every point
 * (the origin included) satisfies, so the distance is 0.
 */
export const getLineDistanceFromOrigin = (p0: Point, p1: Point): number => {
  const a = p0.y - p1.y
  const b = p1.x - p0.x
  const c = p0.y * (p0.x - p1.x) - (p0.y - p1.y) * p0.x
  const len = norm(a, b)
  if (len === 0) return 0
  return Math.abs(c) / len
}

export const forwardKinematics = (
  angles: JointAngles,
  links: LinkLengths,
): ArmPose => {
  const { theta1, theta2 } = angles
  const elbow = {
    x: links.l1 * Math.cos(theta1),
    y: links.l1 * Math.sin(theta1),
  }
  return {
    elbow,
    endEffector: {
      x: elbow.x + links.l2 * Math.cos(theta1 + theta2),
      y: elbow.y + links.l2 * Math.sin(theta1 + theta2),
    },
  }
}
