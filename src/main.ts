#!/usr/bin/env node
import { Command } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"
import { attachCommand } from "./commands/attach.js"
import { replayCommand } from "./commands/replay.js"

const root = Command.make("gridterm", {}, () => Effect.succeed(undefined)).pipe(
  Command.withSubcommands([attachCommand, replayCommand]),
)

const cli = Command.run(root, { name: "gridterm", version: "0.1.0" })

const defaultedToAttach = process.argv.length <= 2
const argv = defaultedToAttach ? [...process.argv.slice(0, 2), "attach"] : process.argv

cli(argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain)
