#!/usr/bin/env node
import { createDefaultContext, main } from './index.js'

// Ctrl-C stops the run at the next page boundary; a second one exits at once
const controller = new AbortController()
process.once('SIGINT', () => {
  controller.abort()
  process.once('SIGINT', () => process.exit(130))
})

process.exitCode = await main(process.argv.slice(2), createDefaultContext(controller.signal))
