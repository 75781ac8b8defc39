import type { GraphicsObject } from "graphics-debug"
import type { TrajectoryProblem } from "../types"

export type TrajectoryGraphics = Required<
  Pick<
    GraphicsObject,
    "points" | "lines" | "circles" | "coordinateSystem" | "title"
  >
>

export const visualizeInputProblem = (
  problem: TrajectoryProblem,
): TrajectoryGraphics => {
  const graphics: TrajectoryGraphics = {
    points: [],
    lines: [],
    circles: [],
    coordinateSystem: "cartesian",
    title: "two-link trajectory",
  }

  const { initial, desired, links } = problem
  const origin = { x: 0, y: 0 }

  // Workspace annulus
  graphics.circles.push({
    center: origin,
    radius: links.l1 + links.l2,
    stroke: "gray",
    label: "outer workspace",
  })

  const innerRadius = Math.abs(links.l1 - links.l2)
  if (innerRadius > 0) {
    graphics.circles.push({
      center: origin,
      radius: innerRadius,
      stroke: "rgba(255, 0, 0, 0.5)",
      label: "inner workspace",
    })
  }

  // Straight-line path
  graphics.lines.push({
    points: [
      { x: initial.x, y: initial.y },
      { x: desired.x, y: desired.y },
    ],
    strokeColor: "rgba(0, 0, 255, 0.5)",
    strokeDash: [4, 2],
    label: "path",
  })

  graphics.points.push(
    { x: initial.x, y: initial.y, color: "green", label: "initial" },
    { x: desired.x, y: desired.y, color: "red", label: "desired" },
  )

  return graphics
}
