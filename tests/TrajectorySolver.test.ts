import { describe, expect, test } from "vitest"
import { sampleTrajectory } from "../lib/sampleTrajectory"
import { TrajectorySolver } from "../lib/TrajectorySolver"
import type { TrajectoryProblem } from "../lib/types"

const problem: TrajectoryProblem = {
  initial: { x: 1, y: 1 },
  desired: { x: -1, y: 1 },
  links: { l1: 1, l2: 1 },
  solve: { steps: 4 },
}

describe("TrajectorySolver", () => {
  test("checks feasibility before computing waypoints", () => {
    const solver = new TrajectorySolver(problem)
    solver.step()
    expect(solver.verdict).toBe("feasible")
    expect(solver.waypoints).toHaveLength(0)

    solver.step()
    expect(solver.waypoints).toHaveLength(1)
    expect(solver.waypoints[0].tag).toBe("initial")
    expect(solver.solved).toBe(false)
  })

  test("solves in one iteration per waypoint plus the check", () => {
    const solver = new TrajectorySolver(problem)
    solver.solve()
    expect(solver.solved).toBe(true)
    expect(solver.failed).toBe(false)
    expect(solver.iterations).toBe(6)
  })

  test("matches the eager sampler", () => {
    const solver = new TrajectorySolver(problem)
    solver.solve()
    expect(solver.getTrajectory()).toEqual(
      sampleTrajectory(problem.initial, problem.desired, problem.links, 4),
    )
  })

  test("defaults", () => {
    const solver = new TrajectorySolver({
      initial: problem.initial,
      desired: problem.desired,
      links: problem.links,
    })
    expect(solver.steps).toBe(50)
    expect(solver.branch).toBe("positive")
    expect(solver.epsilon).toBe(1e-9)
    expect(solver.MAX_ITERATIONS).toBe(52)
  })

  test("negative branch from the solve block", () => {
    const solver = new TrajectorySolver({
      ...problem,
      solve: { steps: 4, branch: "negative" },
    })
    solver.solve()
    expect(solver.getTrajectory()[0].angles.theta2).toBeCloseTo(
      -Math.PI / 2,
      12,
    )
  })

  test("epsilon from the solve block", () => {
    const base: TrajectoryProblem = {
      initial: { x: 1, y: 0 },
      desired: { x: -1, y: 0 },
      links: { l1: 1, l2: 1.000001 },
    }
    const strict = new TrajectorySolver(base)
    strict.solve()
    expect(strict.verdict).toBe("trajectory_blocked")

    const loose = new TrajectorySolver({ ...base, solve: { epsilon: 1e-5 } })
    loose.solve()
    expect(loose.verdict).toBe("trajectory_singular")
  })

  test("infeasible problem fails without waypoints", () => {
    const solver = new TrajectorySolver({
      ...problem,
      desired: { x: 5, y: 0 },
    })
    solver.solve()
    expect(solver.failed).toBe(true)
    expect(solver.solved).toBe(false)
    expect(solver.verdict).toBe("out_of_workspace")
    expect(solver.error).toBe("Position(s) is(are) not in the operable range.")
    expect(solver.waypoints).toHaveLength(0)
    expect(solver.iterations).toBe(1)
  })

  test("getTrajectory before solving throws", () => {
    const solver = new TrajectorySolver(problem)
    expect(() => solver.getTrajectory()).toThrow(
      "TrajectorySolver has not solved the trajectory",
    )
  })

  test("rejects an epsilon that is NaN or negative", () => {
    expect(
      () =>
        new TrajectorySolver({
          ...problem,
          desired: { x: 10, y: 0 },
          solve: { epsilon: Number.NaN },
        }),
    ).toThrow(RangeError)
    expect(
      () => new TrajectorySolver({ ...problem, solve: { epsilon: -1 } }),
    ).toThrow(RangeError)
  })

  test("returned trajectory is a copy", () => {
    const solver = new TrajectorySolver(problem)
    solver.solve()
    const trajectory = solver.getTrajectory()
    trajectory.push(trajectory[0])
    expect(solver.getTrajectory()).toHaveLength(5)
    expect(solver.waypoints).toHaveLength(5)
  })

  test("rejects an invalid step count", () => {
    expect(
      () => new TrajectorySolver({ ...problem, solve: { steps: 0 } }),
    ).toThrow(RangeError)
  })
})
