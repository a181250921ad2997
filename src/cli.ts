#!/usr/bin/env node
import { startRepl } from './repl'

startRepl({
  input: process.stdin,
  output: process.stdout,
  terminal: process.stdin.isTTY,
}).then(
  () => {
    process.exitCode = 0
  },
  (error: unknown) => {
    console.error(error)
    process.exitCode = 1
  }
)
