/**
 * Solve a two-link trajectory problem and print the joint angle table.
 *
 * Run from project root:
 *   npm run trajectory -- fixtures/basics/basics01-input.json
 */

import { runTrajectoryCli } from "../lib/runTrajectoryCli"

process.exitCode = runTrajectoryCli(process.argv.slice(2))
