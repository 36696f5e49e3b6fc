#!/usr/bin/env node
import { createTerminalIo } from './io.ts'
import { runCli } from './program.ts'

process.exitCode = await runCli(process.argv.slice(2), {
  io: createTerminalIo(),
  env: process.env,
  cwd: process.cwd(),
})
