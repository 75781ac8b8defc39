import type { Trajectory, Waypoint } from "./types"

const ANGLE_WIDTH = 13
const POSITION_WIDTH = 15
const SEPARATOR = " | "
const RULE_WIDTH = 68

export const centerText = (s: string, width: number): string => {
  const padding = width - s.length
  if (padding <= 0) return s
  const side = " ".repeat(Math.floor(padding / 2))
  return `${side}${s}${side}${padding % 2 !== 0 ? " " : ""}`
}

const formatNumber = (v: number, decimals: number, width: number) =>
  v.toFixed(decimals).padStart(width, " ")

const formatRow = (wp: Waypoint, decimals: number): string => {
  const row = [
    formatNumber(wp.angles.theta1, decimals, ANGLE_WIDTH),
    formatNumber(wp.angles.theta2, decimals, ANGLE_WIDTH),
    formatNumber(wp.position.x, decimals, POSITION_WIDTH),
    formatNumber(wp.position.y, decimals, POSITION_WIDTH),
  ].join(SEPARATOR)
  return wp.tag === "intermediate" ? row : `${row} (${wp.tag})`
}

/**
 * Fixed-width table of joint angles and end-effector positions, one row
 * per waypoint.
 */
export const formatTrajectoryTable = (
  trajectory: Trajectory,
  options: { decimals?: number } = {},
): string => {
  const decimals = options.decimals ?? 3

  const header = [
    centerText("Angle 1 [rad]", ANGLE_WIDTH),
    centerText("Angle 2 [rad]", ANGLE_WIDTH),
    centerText("x, end-effector", POSITION_WIDTH),
    centerText("y, end-effector", POSITION_WIDTH),
  ].join(SEPARATOR)
  const rows = trajectory.map((wp) => formatRow(wp, decimals))

  return [header, "-".repeat(RULE_WIDTH), ...rows].join("\n")
}
