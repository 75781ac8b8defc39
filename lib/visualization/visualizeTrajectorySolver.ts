import { forwardKinematics } from "../geometry"
import type { TrajectorySolver } from "../TrajectorySolver"
import {
  type TrajectoryGraphics,
  visualizeInputProblem,
} from "./visualizeInputProblem"

export const visualizeTrajectorySolver = (
  solver: TrajectorySolver,
): TrajectoryGraphics => {
  const graphics = visualizeInputProblem(solver.input)
  graphics.title = `two-link trajectory (${solver.waypoints.length}/${solver.steps + 1})`

  for (const wp of solver.waypoints) {
    graphics.points.push({
      x: wp.position.x,
      y: wp.position.y,
      color: wp.tag === "intermediate" ? "blue" : "black",
      label: `${wp.tag} ${wp.index}`,
    })
  }

  // Draw the arm at the last solved waypoint
  const current = solver.waypoints[solver.waypoints.length - 1]
  if (current) {
    const { elbow, endEffector } = forwardKinematics(
      current.angles,
      solver.input.links,
    )
    graphics.lines.push(
      {
        points: [{ x: 0, y: 0 }, elbow],
        strokeWidth: 0.05,
        strokeColor: "orange",
        label: "link 1",
      },
      {
        points: [elbow, endEffector],
        strokeWidth: 0.05,
        strokeColor: "purple",
        label: "link 2",
      },
    )
  }

  return graphics
}
