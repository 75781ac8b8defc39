import type { ElbowBranch, Point, TrajectoryProblem } from "./types"

type JsonObject = { [key: string]: unknown }

const isObject = (v: unknown): v is JsonObject =>
  typeof v === "object" && v !== null && !Array.isArray(v)

const readNumber = (obj: JsonObject, key: string, path: string): number => {
  const v = obj[key]
  if (typeof v !== "number") {
    throw new Error(`${path}.${key} must be a number`)
  }
  return v
}

const readOptionalNumber = (
  obj: JsonObject,
  key: string,
  path: string,
): number | undefined =>
  obj[key] === undefined ? undefined : readNumber(obj, key, path)

const readObject = (obj: JsonObject, key: string, path: string) => {
  const v = obj[key]
  if (!isObject(v)) throw new Error(`${path}.${key} must be an object`)
  return v
}

const readPoint = (obj: JsonObject, key: string): Point => {
  const p = readObject(obj, key, "problem")
  return {
    x: readNumber(p, "x", `problem.${key}`),
    y: readNumber(p, "y", `problem.${key}`),
  }
}

const readBranch = (obj: JsonObject): ElbowBranch | undefined => {
  const v = obj.branch
  if (v === undefined || v === "positive" || v === "negative") return v
  throw new Error(`problem.solve.branch must be "positive" or "negative"`)
}

/**
 * Narrow parsed JSON to a TrajectoryProblem. Only the shape is checked
 * here; geometric validity is left to checkFeasibility.
 */
export const parseTrajectoryProblem = (value: unknown): TrajectoryProblem => {
  if (!isObject(value)) throw new Error("problem must be an object")

  const links = readObject(value, "links", "problem")
  const problem: TrajectoryProblem = {
    initial: readPoint(value, "initial"),
    desired: readPoint(value, "desired"),
    links: {
      l1: readNumber(links, "l1", "problem.links"),
      l2: readNumber(links, "l2", "problem.links"),
    },
  }

  if (value.solve !== undefined) {
    const solve = readObject(value, "solve", "problem")
    const epsilon = readOptionalNumber(solve, "epsilon", "problem.solve")
    if (epsilon !== undefined && epsilon < 0) {
      throw new Error("problem.solve.epsilon must be >= 0")
    }
    problem.solve = {
      steps: readOptionalNumber(solve, "steps", "problem.solve"),
      branch: readBranch(solve),
      epsilon,
    }
  }

  return problem
}
