import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, pipe } from "effect"

import { program } from "./program.js"

// CHANGE: run the program through the Node platform runtime with its layer
// WHY: FileSystem and Path for config lookup come from NodeContext; runMain reports failures and handles signals
// QUOTE(TZ): n/a
// REF: user-2026-10-19-pesel
// SOURCE: https://effect.website/docs/platform/runtime/ "runMain helps you execute a main effect with built-in error handling, logging, and signal management."
// FORMAT THEOREM: forall args in Argv: runMain(program)
// PURITY: SHELL
// EFFECT: Effect<void, ConfigError, never>
// INVARIANT: program executed with NodeContext.layer
// COMPLEXITY: O(1)/O(1)
const main = pipe(program, Effect.provide(NodeContext.layer))

NodeRuntime.runMain(main)
