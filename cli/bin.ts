#!/usr/bin/env node
/**
 * arcfs CLI entry point
 *
 * This is the main executable for the arcfs CLI. Archives and source files
 * live on the local disk; relative paths resolve against the working
 * directory.
 *
 * Usage:
 *   arcfs create ./public site.vfsa
 *   arcfs ls site.vfsa docs
 *   arcfs cat site.vfsa docs/readme.md
 */

import { runCLI } from './index.js'
import { NodeStorage } from '../storage/node.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('[arcfs-cli]')

// CLI context
const context = {
  storage: new NodeStorage(),
  stdout: (text: string) => process.stdout.write(text + '\n'),
  stderr: (text: string) => process.stderr.write(text + '\n'),
}

// Run the CLI
const args = process.argv.slice(2)
runCLI(args, context)
  .then(result => {
    process.exit(result.exitCode)
  })
  .catch(err => {
    logger.error('Fatal error:', err)
    process.exit(1)
  })
