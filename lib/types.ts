/**
 * TrajectoryProblem
 *
 * Straight-line motion of a 2-link planar arm.
 *
 * Core assumptions:
 * - The first joint sits at the origin.
 * - Joints track commanded angles perfectly (no dynamics).
 * - The end-effector moves along the segment initial -> desired.
 */
export type TrajectoryProblem = {
  /** End-effector position at the start of the motion */
  initial: Point

  /** End-effector position at the end of the motion */
  desired: Point

  links: LinkLengths

  solve?: {
    /**
     * Number of segments the straight line is split into.
     * The trajectory has steps + 1 waypoints.
     * Default: 50
     */
    steps?: number
    /**
     * Elbow configuration used for every waypoint.
     * Default: "positive"
     */
    branch?: ElbowBranch
    /**
     * Tolerance for the workspace bounds and the singularity checks.
     * Default: 1e-9
     */
    epsilon?: number
  }
}

export type Point = { x: number; y: number }

/**
 * Lengths of the two links, both expected > 0.
 * The reachable workspace is the annulus [|l1 - l2|, l1 + l2].
 */
export type LinkLengths = { l1: number; l2: number }

/**
 * Joint angles in radians.
 * - theta1: absolute angle of the first link
 * - theta2: angle of the second link relative to the first
 */
export type JointAngles = { theta1: number; theta2: number }

/**
 * Which of the two IK solutions to pick.
 * "positive" keeps theta2 in [0, pi], "negative" in [-pi, 0].
 */
export type ElbowBranch = "positive" | "negative"

export type WaypointTag = "initial" | "intermediate" | "final"

export type Waypoint = {
  index: number
  tag: WaypointTag
  angles: JointAngles
  position: Point
}

/** Exactly steps + 1 waypoints, ordered from initial to final */
export type Trajectory = Waypoint[]

export type FeasibilityVerdict =
  | "feasible"
  /** Non-finite coordinates, or link lengths that are not > 0 */
  | "invalid_input"
  /** An endpoint lies outside the workspace annulus */
  | "out_of_workspace"
  /** The segment passes through the unreachable inner disk */
  | "trajectory_blocked"
  /** Equal links and a segment through the origin */
  | "trajectory_singular"

export type ArmPose = {
  elbow: Point
  endEffector: Point
}
