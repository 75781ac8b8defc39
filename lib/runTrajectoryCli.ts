import fs from "fs"
import path from "path"

import { formatTrajectoryTable } from "./formatTrajectoryTable"
import { parseTrajectoryProblem } from "./parseTrajectoryProblem"
import { TrajectorySolver } from "./TrajectorySolver"

export type CliIo = {
  stdout: (line: string) => void
  stderr: (line: string) => void
  readFile: (filePath: string) => string
}

const defaultIo: CliIo = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
  readFile: (filePath) => fs.readFileSync(filePath, "utf8"),
}

/**
 * Load the problem file named by `args[0]`, solve it and report.
 * Returns the process exit code.
 */
export const runTrajectoryCli = (
  args: string[],
  io: CliIo = defaultIo,
): number => {
  const problemArg = args[0]
  if (!problemArg) {
    io.stderr("Usage: npm run trajectory -- <problem.json>")
    return 1
  }

  const problemPath = path.resolve(problemArg)

  let solver: TrajectorySolver
  try {
    const problem = parseTrajectoryProblem(
      JSON.parse(io.readFile(problemPath)),
    )
    solver = new TrajectorySolver(problem)
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e)
    io.stderr(`Could not load ${problemPath}: ${reason}`)
    return 1
  }

  solver.solve()

  if (solver.failed) {
    io.stderr(`${solver.error} Terminating ...`)
    return 1
  }

  io.stdout(formatTrajectoryTable(solver.getTrajectory()))
  return 0
}
