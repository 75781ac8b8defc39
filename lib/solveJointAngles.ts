import { DEFAULT_EPSILON } from "./checkFeasibility"
import { norm } from "./geometry"
import type { ElbowBranch, JointAngles, LinkLengths, Point } from "./types"

const clampUnit = (v: number) => (v < -1 ? -1 : v > 1 ? 1 : v)

/**
 * Law-of-cosines IK for a 2-link planar arm.
 *
 * Does no reachability checking: callers are expected to run
 * checkFeasibility first. Points within epsilon of the workspace annulus
 * get a clamped cosine so they still give finite angles; anything further
 * out gives NaN.
 */
export const solveJointAngles = (
  position: Point,
  links: LinkLengths,
  branch: ElbowBranch = "positive",
  epsilon: number = DEFAULT_EPSILON,
): JointAngles => {
  const { x, y } = position
  const { l1, l2 } = links

  const r = norm(x, y)
  const nearWorkspace =
    r >= Math.abs(l1 - l2) - epsilon && r <= l1 + l2 + epsilon
  const rawCos = (x * x + y * y - l1 * l1 - l2 * l2) / (2 * l1 * l2)
  const cosTheta2 = nearWorkspace ? clampUnit(rawCos) : rawCos
  const elbow = Math.acos(cosTheta2)
  const theta2 = branch === "positive" ? elbow : -elbow

  const theta1 =
    Math.atan2(y, x) -
    Math.atan2(l2 * Math.sin(theta2), l1 + l2 * Math.cos(theta2))

  return { theta1, theta2 }
}
