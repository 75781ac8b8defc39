import { describe, expect, test } from "vitest"
import { parseTrajectoryProblem } from "../lib/parseTrajectoryProblem"

const valid = {
  initial: { x: 1, y: 1 },
  desired: { x: -1, y: 1 },
  links: { l1: 1, l2: 1 },
}

describe("parseTrajectoryProblem", () => {
  test("problem without a solve block", () => {
    expect(parseTrajectoryProblem(valid)).toEqual(valid)
  })

  test("problem with a solve block", () => {
    expect(
      parseTrajectoryProblem({
        ...valid,
        solve: { steps: 10, branch: "negative", epsilon: 1e-6 },
      }).solve,
    ).toEqual({ steps: 10, branch: "negative", epsilon: 1e-6 })
  })

  test("not an object", () => {
    expect(() => parseTrajectoryProblem([1, 2])).toThrow(
      "problem must be an object",
    )
    expect(() => parseTrajectoryProblem(null)).toThrow(
      "problem must be an object",
    )
  })

  test("missing links", () => {
    expect(() =>
      parseTrajectoryProblem({ initial: valid.initial, desired: valid.desired }),
    ).toThrow("problem.links must be an object")
  })

  test("coordinate that is not a number", () => {
    expect(() =>
      parseTrajectoryProblem({ ...valid, initial: { x: "1", y: 1 } }),
    ).toThrow("problem.initial.x must be a number")
  })

  test("negative epsilon", () => {
    expect(() =>
      parseTrajectoryProblem({ ...valid, solve: { epsilon: -0.5 } }),
    ).toThrow("problem.solve.epsilon must be >= 0")
  })

  test("zero epsilon", () => {
    expect(
      parseTrajectoryProblem({ ...valid, solve: { epsilon: 0 } }).solve
        ?.epsilon,
    ).toBe(0)
  })

  test("unknown branch", () => {
    expect(() =>
      parseTrajectoryProblem({ ...valid, solve: { branch: "up" } }),
    ).toThrow('problem.solve.branch must be "positive" or "negative"')
  })
})
