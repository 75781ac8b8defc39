import { BaseSolver } from "@tscircuit/solver-utils"
import type { GraphicsObject } from "graphics-debug"
import {
  assertValidEpsilon,
  checkFeasibility,
  DEFAULT_EPSILON,
  getFeasibilityMessage,
} from "./checkFeasibility"
import {
  assertValidSteps,
  computeWaypoint,
  DEFAULT_STEPS,
} from "./sampleTrajectory"
import type {
  ElbowBranch,
  FeasibilityVerdict,
  Trajectory,
  TrajectoryProblem,
  Waypoint,
} from "./types"
import { visualizeInputProblem } from "./visualization/visualizeInputProblem"
import { visualizeTrajectorySolver } from "./visualization/visualizeTrajectorySolver"

/**
 * Walks the straight line of a TrajectoryProblem one waypoint per step.
 *
 * The first step runs the feasibility check. An infeasible problem fails
 * the solver before any waypoint is computed, so a failed solver never
 * holds a partial trajectory.
 */
export class TrajectorySolver extends BaseSolver {
  readonly steps: number
  readonly branch: ElbowBranch
  readonly epsilon: number

  private _verdict: FeasibilityVerdict | null = null
  private _waypoints: Waypoint[] = []

  get verdict(): FeasibilityVerdict | null {
    return this._verdict
  }

  get waypoints(): readonly Waypoint[] {
    return this._waypoints
  }

  constructor(public input: TrajectoryProblem) {
    super()
    this.steps = input.solve?.steps ?? DEFAULT_STEPS
    this.branch = input.solve?.branch ?? "positive"
    this.epsilon = input.solve?.epsilon ?? DEFAULT_EPSILON
    assertValidSteps(this.steps)
    assertValidEpsilon(this.epsilon)
    // one iteration for the feasibility check, then one per waypoint
    this.MAX_ITERATIONS = this.steps + 2
  }

  override _step(): void {
    if (this.solved) return

    const { initial, desired, links } = this.input

    if (this._verdict === null) {
      this._verdict = checkFeasibility(initial, desired, links, this.epsilon)
      if (this._verdict !== "feasible") {
        this.error = getFeasibilityMessage(this._verdict)
        this.failed = true
      }
      return
    }

    this._waypoints.push(
      computeWaypoint(
        initial,
        desired,
        links,
        this.steps,
        this._waypoints.length,
        this.branch,
        this.epsilon,
      ),
    )

    if (this._waypoints.length === this.steps + 1) {
      this.solved = true
    }
  }

  getTrajectory(): Trajectory {
    if (!this.solved) {
      throw new Error(
        `TrajectorySolver has not solved the trajectory${
          this.error ? `: ${this.error}` : ""
        }`,
      )
    }
    return [...this._waypoints]
  }

  override visualize(): GraphicsObject {
    // nothing computed yet: show the problem itself
    if (this._waypoints.length === 0) {
      return visualizeInputProblem(this.input)
    }

    return visualizeTrajectorySolver(this)
  }
}
