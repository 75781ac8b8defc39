export * from "./types"
export {
  arePointsCoincident,
  forwardKinematics,
  getLineDistanceFromOrigin,
  lerpPoint,
  norm,
} from "./geometry"
export { solveJointAngles } from "./solveJointAngles"
export {
  assertValidEpsilon,
  checkFeasibility,
  DEFAULT_EPSILON,
  getFeasibilityMessage,
} from "./checkFeasibility"
export {
  computeWaypoint,
  DEFAULT_STEPS,
  sampleTrajectory,
} from "./sampleTrajectory"
export { parseTrajectoryProblem } from "./parseTrajectoryProblem"
export { type CliIo, runTrajectoryCli } from "./runTrajectoryCli"
export { TrajectorySolver } from "./TrajectorySolver"
export { centerText, formatTrajectoryTable } from "./formatTrajectoryTable"
export {
  type TrajectoryGraphics,
  visualizeInputProblem,
} from "./visualization/visualizeInputProblem"
export { visualizeTrajectorySolver } from "./visualization/visualizeTrajectorySolver"
